import { and, desc, eq, type SQL } from "drizzle-orm";

import { db } from "../../core/database/client";
import { bookings } from "../bookings/bookings.schema";
import { listings } from "../listings/listings.schema";

import { reviews, type ReviewInsert, type ReviewRecord } from "./reviews.schema";

export type ReviewListFilters = {
  listingId?: string;
  rating?: number;
};

export type ReviewUpdate = Partial<
  Pick<
    ReviewInsert,
    "rating" | "comment" | "cleanlinessRating" | "accuracyRating" | "locationRating" | "valueRating"
  >
>;

export interface ReviewStore {
  listingExists(listingId: string): Promise<boolean>;
  isGuestBooking(bookingId: string, userId: string, listingId: string): Promise<boolean>;
  findByListingAndUser(listingId: string, userId: string): Promise<ReviewRecord | null>;
  findById(reviewId: string): Promise<ReviewRecord | null>;
  list(filters: ReviewListFilters): Promise<ReviewRecord[]>;
  create(data: ReviewInsert): Promise<ReviewRecord>;
  update(reviewId: string, update: ReviewUpdate): Promise<ReviewRecord | null>;
  delete(reviewId: string): Promise<void>;
}

export class ReviewsRepository implements ReviewStore {
  async listingExists(listingId: string): Promise<boolean> {
    const [row] = await db
      .select({ id: listings.id })
      .from(listings)
      .where(and(eq(listings.id, listingId), eq(listings.isActive, true)))
      .limit(1);
    return Boolean(row);
  }

  async isGuestBooking(bookingId: string, userId: string, listingId: string): Promise<boolean> {
    const [row] = await db
      .select({ id: bookings.id })
      .from(bookings)
      .where(
        and(
          eq(bookings.id, bookingId),
          eq(bookings.userId, userId),
          eq(bookings.listingId, listingId)
        )
      )
      .limit(1);
    return Boolean(row);
  }

  async findByListingAndUser(listingId: string, userId: string): Promise<ReviewRecord | null> {
    const [row] = await db
      .select()
      .from(reviews)
      .where(and(eq(reviews.listingId, listingId), eq(reviews.userId, userId)))
      .limit(1);
    return row ?? null;
  }

  async findById(reviewId: string): Promise<ReviewRecord | null> {
    const [row] = await db.select().from(reviews).where(eq(reviews.id, reviewId)).limit(1);
    return row ?? null;
  }

  async list(filters: ReviewListFilters): Promise<ReviewRecord[]> {
    const conditions: SQL[] = [];
    if (filters.listingId) conditions.push(eq(reviews.listingId, filters.listingId));
    if (filters.rating !== undefined) conditions.push(eq(reviews.rating, filters.rating));

    return db
      .select()
      .from(reviews)
      .where(conditions.length ? and(...conditions) : undefined)
      .orderBy(desc(reviews.createdAt));
  }

  async create(data: ReviewInsert): Promise<ReviewRecord> {
    const [row] = await db.insert(reviews).values(data).returning();
    return row;
  }

  async update(reviewId: string, update: ReviewUpdate): Promise<ReviewRecord | null> {
    const [row] = await db
      .update(reviews)
      .set({ ...update, updatedAt: new Date() })
      .where(eq(reviews.id, reviewId))
      .returning();
    return row ?? null;
  }

  async delete(reviewId: string): Promise<void> {
    await db.delete(reviews).where(eq(reviews.id, reviewId));
  }
}
