/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → service call for all auth endpoints.
 * - Returns structured response.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Public handlers take (req, reply). Routed handlers also take the RoutingContext
 *   (see auth.routes.ts) and pass it straight to the service.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { parseOrThrow } from '../../shared/http/validate';
import type { RoutingContext } from '../../shared/tenancy/routing-context';
import type { AuthService } from './auth.service';
import {
  changePasswordSchema,
  loginSchema,
  logoutSchema,
  refreshSchema,
  registerSchema,
  updateProfileSchema,
} from './auth.schemas';

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  async register(req: FastifyRequest, reply: FastifyReply) {
    const body = parseOrThrow(registerSchema, req.body);

    const result = await this.authService.register({
      email: body.email,
      password: body.password,
      firstName: body.firstName,
      lastName: body.lastName,
      companyName: body.companyName,
      companyId: body.companyId,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send(result);
  }

  async login(req: FastifyRequest, reply: FastifyReply) {
    const body = parseOrThrow(loginSchema, req.body);

    const result = await this.authService.login({
      email: body.email,
      password: body.password,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(result);
  }

  async refresh(req: FastifyRequest, reply: FastifyReply) {
    const body = parseOrThrow(refreshSchema, req.body);

    const result = await this.authService.refresh({
      refresh: body.refresh,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(result);
  }

  async logout(req: FastifyRequest, reply: FastifyReply, ctx: RoutingContext) {
    const body = parseOrThrow(logoutSchema, req.body);

    await this.authService.logout(ctx, { refresh: body.refresh });

    return reply.status(200).send({ message: 'Logout successful' });
  }

  async getProfile(_req: FastifyRequest, reply: FastifyReply, ctx: RoutingContext) {
    const user = await this.authService.getProfile(ctx);
    return reply.status(200).send({ user });
  }

  async updateProfile(req: FastifyRequest, reply: FastifyReply, ctx: RoutingContext) {
    const body = parseOrThrow(updateProfileSchema, req.body);

    const user = await this.authService.updateProfile(ctx, body);
    return reply.status(200).send({ user });
  }

  async changePassword(req: FastifyRequest, reply: FastifyReply, ctx: RoutingContext) {
    const body = parseOrThrow(changePasswordSchema, req.body);

    await this.authService.changePassword(ctx, {
      oldPassword: body.oldPassword,
      newPassword: body.newPassword,
    });

    return reply.status(200).send({ message: 'Password changed successfully' });
  }
}
