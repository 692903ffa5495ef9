import {
  ListingCreateInputSchema,
  ListingIdParamSchema,
  ListingsQuerySchema,
  ListingUpdateInputSchema,
} from "@tripnest/shared-schema";
import type { FastifyReply, FastifyRequest } from "fastify";

import { requireActor } from "../../core/http/auth-guard";
import { assertWritable } from "../../core/readonly";
import { ListingsService } from "./listings.service";

export class ListingsController {
  constructor(private readonly listingsService: ListingsService) {}

  async list(request: FastifyRequest, reply: FastifyReply) {
    const query = ListingsQuerySchema.parse(request.query ?? {});
    return reply.send(await this.listingsService.listListings(query));
  }

  async available(request: FastifyRequest, reply: FastifyReply) {
    const query = ListingsQuerySchema.parse(request.query ?? {});
    return reply.send(await this.listingsService.listAvailable(query));
  }

  async get(request: FastifyRequest, reply: FastifyReply) {
    const { listingId } = ListingIdParamSchema.parse(request.params);
    return reply.send(await this.listingsService.getListing(listingId));
  }

  async create(request: FastifyRequest, reply: FastifyReply) {
    assertWritable();
    const actor = requireActor(request);
    const payload = ListingCreateInputSchema.parse(request.body ?? {});
    return reply.status(201).send(await this.listingsService.createListing(actor, payload));
  }

  async update(request: FastifyRequest, reply: FastifyReply) {
    assertWritable();
    const actor = requireActor(request);
    const { listingId } = ListingIdParamSchema.parse(request.params);
    const payload = ListingUpdateInputSchema.parse(request.body ?? {});
    return reply.send(await this.listingsService.updateListing(actor, listingId, payload));
  }

  async remove(request: FastifyRequest, reply: FastifyReply) {
    assertWritable();
    const actor = requireActor(request);
    const { listingId } = ListingIdParamSchema.parse(request.params);
    await this.listingsService.deleteListing(actor, listingId);
    return reply.status(204).send();
  }
}
