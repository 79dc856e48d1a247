/**
 * backend/src/modules/tenants/tenant.controller.ts
 *
 * WHY:
 * - Maps HTTP -> TenantDirectory call.
 *
 * RULES:
 * - No DB access here.
 * - Responses use TenantSummary: the database descriptor never leaves the server.
 * - Admin handlers are routed with scope 'shared' (platform superuser), see tenant.routes.ts.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { parseOrThrow } from '../../shared/http/validate';
import { withRequestContext } from '../../shared/logger/with-context';
import type { RoutingContext } from '../../shared/tenancy/routing-context';
import { toTenantSummary } from './queries/tenant.queries';
import type { TenantDirectory } from './tenant-directory';
import {
  companyIdParamsSchema,
  listCompaniesQuerySchema,
  renameCompanySchema,
} from './tenant.schemas';

export class TenantController {
  constructor(private readonly directory: TenantDirectory) {}

  /** Public: companies a new user can join at registration. */
  async listPublic(_req: FastifyRequest, reply: FastifyReply) {
    const tenants = await this.directory.listActive();

    return reply.status(200).send({
      companies: tenants.map((t) => ({ id: t.id, name: t.name, slug: t.slug })),
    });
  }

  async listAll(req: FastifyRequest, reply: FastifyReply, _ctx: RoutingContext) {
    const query = parseOrThrow(listCompaniesQuerySchema, req.query, 'Invalid query parameters');

    let tenants = await this.directory.listAll();
    if (query.active !== undefined) {
      const active = query.active === 'true';
      tenants = tenants.filter((t) => t.isActive === active);
    }

    return reply.status(200).send({ companies: tenants.map(toTenantSummary) });
  }

  async rename(req: FastifyRequest, reply: FastifyReply, _ctx: RoutingContext) {
    const params = parseOrThrow(companyIdParamsSchema, req.params, 'Invalid company id');
    const body = parseOrThrow(renameCompanySchema, req.body);

    const tenant = await this.directory.rename(params.id, body.name);

    withRequestContext(req).info('admin.company_renamed', {
      flow: 'admin.companies',
      companyId: tenant.id,
    });

    return reply.status(200).send({ company: toTenantSummary(tenant) });
  }

  async deactivate(req: FastifyRequest, reply: FastifyReply, _ctx: RoutingContext) {
    const params = parseOrThrow(companyIdParamsSchema, req.params, 'Invalid company id');

    const tenant = await this.directory.deactivate(params.id);

    withRequestContext(req).info('admin.company_deactivated', {
      flow: 'admin.companies',
      companyId: tenant.id,
    });

    return reply.status(200).send({ company: toTenantSummary(tenant) });
  }
}
