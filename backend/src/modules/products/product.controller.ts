/**
 * backend/src/modules/products/product.controller.ts
 *
 * WHY:
 * - Maps HTTP -> ProductService call.
 *
 * RULES:
 * - No DB access here.
 * - Every handler is routed (tenant scope): the RoutingContext goes straight to the service.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { parseOrThrow } from '../../shared/http/validate';
import type { RoutingContext } from '../../shared/tenancy/routing-context';
import type { ProductService } from './product.service';
import {
  addImagesSchema,
  createProductSchema,
  imageIdParamsSchema,
  listProductsQuerySchema,
  productIdParamsSchema,
  replaceProductSchema,
  updateImageSchema,
  updateProductSchema,
} from './product.schemas';

export class ProductController {
  constructor(private readonly productService: ProductService) {}

  async list(req: FastifyRequest, reply: FastifyReply, ctx: RoutingContext) {
    const query = parseOrThrow(listProductsQuerySchema, req.query, 'Invalid query parameters');

    const page = await this.productService.list(ctx, query);

    return reply.status(200).send({
      products: page.items,
      page: page.page,
      pageSize: page.pageSize,
      total: page.total,
    });
  }

  async get(req: FastifyRequest, reply: FastifyReply, ctx: RoutingContext) {
    const { id } = parseOrThrow(productIdParamsSchema, req.params, 'Invalid product id');

    const product = await this.productService.get(ctx, id);
    return reply.status(200).send({ product });
  }

  async create(req: FastifyRequest, reply: FastifyReply, ctx: RoutingContext) {
    const body = parseOrThrow(createProductSchema, req.body);

    const product = await this.productService.create(ctx, body);
    return reply.status(201).send({ product });
  }

  async update(req: FastifyRequest, reply: FastifyReply, ctx: RoutingContext) {
    const { id } = parseOrThrow(productIdParamsSchema, req.params, 'Invalid product id');
    const body = parseOrThrow(updateProductSchema, req.body);

    const product = await this.productService.update(ctx, id, body);
    return reply.status(200).send({ product });
  }

  async replace(req: FastifyRequest, reply: FastifyReply, ctx: RoutingContext) {
    const { id } = parseOrThrow(productIdParamsSchema, req.params, 'Invalid product id');
    const body = parseOrThrow(replaceProductSchema, req.body);

    const product = await this.productService.update(ctx, id, body);
    return reply.status(200).send({ product });
  }

  async remove(req: FastifyRequest, reply: FastifyReply, ctx: RoutingContext) {
    const { id } = parseOrThrow(productIdParamsSchema, req.params, 'Invalid product id');

    await this.productService.remove(ctx, id);
    return reply.status(200).send({ message: 'Product deleted successfully' });
  }

  async listImages(req: FastifyRequest, reply: FastifyReply, ctx: RoutingContext) {
    const { id } = parseOrThrow(productIdParamsSchema, req.params, 'Invalid product id');

    const images = await this.productService.listImages(ctx, id);
    return reply.status(200).send({ images });
  }

  async getImage(req: FastifyRequest, reply: FastifyReply, ctx: RoutingContext) {
    const { imageId } = parseOrThrow(imageIdParamsSchema, req.params, 'Invalid image id');

    const image = await this.productService.getImage(ctx, imageId);
    return reply.status(200).send({ image });
  }

  async addImages(req: FastifyRequest, reply: FastifyReply, ctx: RoutingContext) {
    const { id } = parseOrThrow(productIdParamsSchema, req.params, 'Invalid product id');
    const body = parseOrThrow(addImagesSchema, req.body);

    const images = await this.productService.addImages(ctx, id, body);
    return reply.status(201).send({ images });
  }

  async updateImage(req: FastifyRequest, reply: FastifyReply, ctx: RoutingContext) {
    const { imageId } = parseOrThrow(imageIdParamsSchema, req.params, 'Invalid image id');
    const body = parseOrThrow(updateImageSchema, req.body);

    const image = await this.productService.updateImage(ctx, imageId, body);
    return reply.status(200).send({ image });
  }

  async deleteImage(req: FastifyRequest, reply: FastifyReply, ctx: RoutingContext) {
    const { imageId } = parseOrThrow(imageIdParamsSchema, req.params, 'Invalid image id');

    await this.productService.deleteImage(ctx, imageId);
    return reply.status(200).send({ message: 'Image deleted successfully' });
  }
}
