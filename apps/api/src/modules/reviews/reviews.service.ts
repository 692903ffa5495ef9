import type {
  ReviewCreateInput,
  ReviewsQuery,
  ReviewUpdateInput,
} from "@tripnest/shared-schema";

import { AppError, badRequest, conflict, isUniqueViolation, notFound } from "../../core/errors";
import type { Actor } from "../users/users.schema";

import type { ReviewStore } from "./reviews.repository";
import type { ReviewRecord } from "./reviews.schema";

export type ReviewDto = {
  id: string;
  listingId: string;
  userId: string;
  bookingId: string | null;
  rating: number;
  comment: string;
  cleanlinessRating: number | null;
  accuracyRating: number | null;
  locationRating: number | null;
  valueRating: number | null;
  createdAt: string;
  updatedAt: string;
};

export function toReviewDto(review: ReviewRecord): ReviewDto {
  return {
    id: review.id,
    listingId: review.listingId,
    userId: review.userId,
    bookingId: review.bookingId,
    rating: review.rating,
    comment: review.comment,
    cleanlinessRating: review.cleanlinessRating,
    accuracyRating: review.accuracyRating,
    locationRating: review.locationRating,
    valueRating: review.valueRating,
    createdAt: review.createdAt.toISOString(),
    updatedAt: review.updatedAt.toISOString(),
  };
}

export class ReviewsService {
  constructor(private readonly repository: ReviewStore) {}

  async listReviews(query: ReviewsQuery): Promise<ReviewDto[]> {
    const records = await this.repository.list({
      listingId: query.listingId,
      rating: query.rating,
    });
    return records.map(toReviewDto);
  }

  async createReview(actor: Actor, input: ReviewCreateInput): Promise<ReviewDto> {
    if (!(await this.repository.listingExists(input.listingId))) {
      throw notFound("listing_not_found");
    }

    if (
      input.bookingId &&
      !(await this.repository.isGuestBooking(input.bookingId, actor.userId, input.listingId))
    ) {
      throw badRequest("invalid_booking");
    }

    const existing = await this.repository.findByListingAndUser(input.listingId, actor.userId);
    if (existing) {
      throw conflict("already_reviewed");
    }

    try {
      const review = await this.repository.create({
        listingId: input.listingId,
        userId: actor.userId,
        bookingId: input.bookingId ?? null,
        rating: input.rating,
        comment: input.comment,
        cleanlinessRating: input.cleanlinessRating ?? null,
        accuracyRating: input.accuracyRating ?? null,
        locationRating: input.locationRating ?? null,
        valueRating: input.valueRating ?? null,
      });
      return toReviewDto(review);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw conflict("already_reviewed");
      }
      throw error;
    }
  }

  async updateReview(
    actor: Actor,
    reviewId: string,
    input: ReviewUpdateInput
  ): Promise<ReviewDto> {
    await this.getAuthoredReview(actor, reviewId);
    const updated = await this.repository.update(reviewId, input);
    if (!updated) {
      throw notFound("review_not_found");
    }
    return toReviewDto(updated);
  }

  async deleteReview(actor: Actor, reviewId: string): Promise<void> {
    await this.getAuthoredReview(actor, reviewId);
    await this.repository.delete(reviewId);
  }

  private async getAuthoredReview(actor: Actor, reviewId: string): Promise<ReviewRecord> {
    const review = await this.repository.findById(reviewId);
    if (!review) {
      throw notFound("review_not_found");
    }
    if (review.userId !== actor.userId) {
      throw new AppError(403, "Only the author can change a review", "forbidden");
    }
    return review;
  }
}
