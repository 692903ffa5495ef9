import {
  ReviewCreateInputSchema,
  ReviewIdParamSchema,
  ReviewsQuerySchema,
  ReviewUpdateInputSchema,
} from "@tripnest/shared-schema";
import type { FastifyReply, FastifyRequest } from "fastify";

import { requireActor } from "../../core/http/auth-guard";
import { assertWritable } from "../../core/readonly";
import { ReviewsService } from "./reviews.service";

export class ReviewsController {
  constructor(private readonly reviewsService: ReviewsService) {}

  async list(request: FastifyRequest, reply: FastifyReply) {
    const query = ReviewsQuerySchema.parse(request.query ?? {});
    return reply.send(await this.reviewsService.listReviews(query));
  }

  async create(request: FastifyRequest, reply: FastifyReply) {
    assertWritable();
    const actor = requireActor(request);
    const payload = ReviewCreateInputSchema.parse(request.body ?? {});
    const review = await this.reviewsService.createReview(actor, payload);
    return reply.status(201).send(review);
  }

  async update(request: FastifyRequest, reply: FastifyReply) {
    assertWritable();
    const actor = requireActor(request);
    const { reviewId } = ReviewIdParamSchema.parse(request.params);
    const payload = ReviewUpdateInputSchema.parse(request.body ?? {});
    return reply.send(await this.reviewsService.updateReview(actor, reviewId, payload));
  }

  async remove(request: FastifyRequest, reply: FastifyReply) {
    assertWritable();
    const actor = requireActor(request);
    const { reviewId } = ReviewIdParamSchema.parse(request.params);
    await this.reviewsService.deleteReview(actor, reviewId);
    return reply.status(204).send();
  }
}
