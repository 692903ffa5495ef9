import { randomUUID } from "crypto";
import { describe, expect, it } from "vitest";

import type {
  ReviewListFilters,
  ReviewStore,
  ReviewUpdate,
} from "../src/modules/reviews/reviews.repository";
import type { ReviewInsert, ReviewRecord } from "../src/modules/reviews/reviews.schema";
import { ReviewsService } from "../src/modules/reviews/reviews.service";
import type { Actor } from "../src/modules/users/users.schema";

const GUEST: Actor = { userId: "a1111111-1111-4111-8111-111111111111", role: "traveler" };
const OTHER: Actor = { userId: "a2222222-2222-4222-8222-222222222222", role: "traveler" };
const LISTING_ID = "c0000000-0000-4000-8000-000000000001";
const BOOKING_ID = "b0000000-0000-4000-8000-000000000001";

class FakeReviewStore implements ReviewStore {
  listingIds = new Set([LISTING_ID]);
  guestBookings = new Set([`${BOOKING_ID}:${GUEST.userId}:${LISTING_ID}`]);
  reviews = new Map<string, ReviewRecord>();

  async listingExists(listingId: string): Promise<boolean> {
    return this.listingIds.has(listingId);
  }

  async isGuestBooking(bookingId: string, userId: string, listingId: string): Promise<boolean> {
    return this.guestBookings.has(`${bookingId}:${userId}:${listingId}`);
  }

  async findByListingAndUser(listingId: string, userId: string): Promise<ReviewRecord | null> {
    return (
      [...this.reviews.values()].find(
        (review) => review.listingId === listingId && review.userId === userId
      ) ?? null
    );
  }

  async findById(reviewId: string): Promise<ReviewRecord | null> {
    return this.reviews.get(reviewId) ?? null;
  }

  async list(filters: ReviewListFilters): Promise<ReviewRecord[]> {
    return [...this.reviews.values()].filter(
      (review) =>
        (!filters.listingId || review.listingId === filters.listingId) &&
        (filters.rating === undefined || review.rating === filters.rating)
    );
  }

  async create(data: ReviewInsert): Promise<ReviewRecord> {
    const now = new Date("2026-05-10T09:00:00.000Z");
    const record: ReviewRecord = {
      id: data.id ?? randomUUID(),
      listingId: data.listingId,
      userId: data.userId,
      bookingId: data.bookingId ?? null,
      rating: data.rating,
      comment: data.comment,
      cleanlinessRating: data.cleanlinessRating ?? null,
      accuracyRating: data.accuracyRating ?? null,
      locationRating: data.locationRating ?? null,
      valueRating: data.valueRating ?? null,
      createdAt: now,
      updatedAt: now,
    };
    this.reviews.set(record.id, record);
    return record;
  }

  async update(reviewId: string, update: ReviewUpdate): Promise<ReviewRecord | null> {
    const current = this.reviews.get(reviewId);
    if (!current) return null;
    const next: ReviewRecord = {
      ...current,
      rating: update.rating ?? current.rating,
      comment: update.comment ?? current.comment,
    };
    this.reviews.set(reviewId, next);
    return next;
  }

  async delete(reviewId: string): Promise<void> {
    this.reviews.delete(reviewId);
  }
}

function setup() {
  const store = new FakeReviewStore();
  return { store, service: new ReviewsService(store) };
}

describe("ReviewsService", () => {
  it("creates a review tied to the guest's booking", async () => {
    const { service } = setup();

    const review = await service.createReview(GUEST, {
      listingId: LISTING_ID,
      bookingId: BOOKING_ID,
      rating: 5,
      comment: "Quiet and clean",
      cleanlinessRating: 5,
    });

    expect(review).toMatchObject({
      listingId: LISTING_ID,
      userId: GUEST.userId,
      bookingId: BOOKING_ID,
      rating: 5,
      cleanlinessRating: 5,
      accuracyRating: null,
      createdAt: "2026-05-10T09:00:00.000Z",
    });
  });

  it("rejects a booking that is not the guest's stay at this listing", async () => {
    const { service } = setup();

    await expect(
      service.createReview(OTHER, { listingId: LISTING_ID, bookingId: BOOKING_ID, rating: 4, comment: "Nice" })
    ).rejects.toMatchObject({ statusCode: 400, code: "invalid_booking" });
  });

  it("returns 404 for an unknown listing", async () => {
    const { service } = setup();

    await expect(
      service.createReview(GUEST, {
        listingId: "c0000000-0000-4000-8000-00000000ffff",
        rating: 4,
        comment: "Nice",
      })
    ).rejects.toMatchObject({ statusCode: 404, code: "listing_not_found" });
  });

  it("allows one review per guest and listing", async () => {
    const { service } = setup();
    await service.createReview(GUEST, { listingId: LISTING_ID, rating: 4, comment: "Nice" });

    await expect(
      service.createReview(GUEST, { listingId: LISTING_ID, rating: 2, comment: "Changed my mind" })
    ).rejects.toMatchObject({ statusCode: 409, code: "already_reviewed" });
  });

  it("lets only the author edit or delete", async () => {
    const { store, service } = setup();
    const review = await service.createReview(GUEST, {
      listingId: LISTING_ID,
      rating: 4,
      comment: "Nice",
    });

    await expect(service.updateReview(OTHER, review.id, { rating: 1 })).rejects.toMatchObject({
      statusCode: 403,
      code: "forbidden",
    });
    await expect(service.deleteReview(OTHER, review.id)).rejects.toMatchObject({ statusCode: 403 });

    const updated = await service.updateReview(GUEST, review.id, { rating: 3 });
    expect(updated.rating).toBe(3);
    expect(updated.comment).toBe("Nice");

    await service.deleteReview(GUEST, review.id);
    expect(store.reviews.size).toBe(0);
  });

  it("returns 404 for a missing review", async () => {
    const { service } = setup();

    await expect(
      service.updateReview(GUEST, "e0000000-0000-4000-8000-000000000001", { rating: 3 })
    ).rejects.toMatchObject({ statusCode: 404, code: "review_not_found" });
  });

  it("filters reviews by rating", async () => {
    const { service } = setup();
    await service.createReview(GUEST, { listingId: LISTING_ID, rating: 4, comment: "Nice" });
    await service.createReview(OTHER, { listingId: LISTING_ID, rating: 2, comment: "Noisy" });

    const lowRated = await service.listReviews({ listingId: LISTING_ID, rating: 2 });
    expect(lowRated.map((review) => review.comment)).toEqual(["Noisy"]);
  });
});
