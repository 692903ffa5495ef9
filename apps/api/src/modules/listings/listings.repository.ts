import {
  and,
  asc,
  avg,
  count,
  desc,
  eq,
  gt,
  gte,
  ilike,
  inArray,
  lt,
  lte,
  not,
  or,
  type SQL,
} from "drizzle-orm";
import type { ListingOrdering } from "@tripnest/shared-schema";

import { db } from "../../core/database/client";
import { bookings } from "../bookings/bookings.schema";
import { reviews, type ReviewRecord } from "../reviews/reviews.schema";

import { listings, type ListingInsert, type ListingRecord } from "./listings.schema";

export type ListingSearchFilters = {
  location?: string;
  search?: string;
  minPrice?: string;
  maxPrice?: string;
  maxGuests?: number;
  bedrooms?: number;
  bathrooms?: number;
  availability?: boolean;
  stay?: { checkIn: string; checkOut: string };
  ordering: ListingOrdering;
  limit: number;
  offset: number;
};

export type ListingRatingSummary = {
  averageRating: number | null;
  reviewsCount: number;
};

export type ListingUpdate = Partial<
  Pick<
    ListingInsert,
    | "title"
    | "description"
    | "location"
    | "pricePerNight"
    | "maxGuests"
    | "bedrooms"
    | "bathrooms"
    | "amenities"
    | "availability"
  >
>;

export interface ListingStore {
  search(filters: ListingSearchFilters): Promise<ListingRecord[]>;
  findActiveById(listingId: string): Promise<ListingRecord | null>;
  ratingSummary(listingId: string): Promise<ListingRatingSummary>;
  latestReviews(listingId: string, limit: number): Promise<ReviewRecord[]>;
  create(data: ListingInsert): Promise<ListingRecord>;
  update(listingId: string, update: ListingUpdate): Promise<ListingRecord | null>;
  deactivate(listingId: string): Promise<void>;
}

const ORDERINGS: Record<ListingOrdering, SQL> = {
  price_per_night: asc(listings.pricePerNight),
  "-price_per_night": desc(listings.pricePerNight),
  created_at: asc(listings.createdAt),
  "-created_at": desc(listings.createdAt),
  title: asc(listings.title),
  "-title": desc(listings.title),
};

export class ListingsRepository implements ListingStore {
  async search(filters: ListingSearchFilters): Promise<ListingRecord[]> {
    const conditions: SQL[] = [eq(listings.isActive, true)];

    if (filters.location) conditions.push(eq(listings.location, filters.location));
    if (filters.minPrice) conditions.push(gte(listings.pricePerNight, filters.minPrice));
    if (filters.maxPrice) conditions.push(lte(listings.pricePerNight, filters.maxPrice));
    if (filters.maxGuests !== undefined) conditions.push(eq(listings.maxGuests, filters.maxGuests));
    if (filters.bedrooms !== undefined) conditions.push(eq(listings.bedrooms, filters.bedrooms));
    if (filters.bathrooms !== undefined) conditions.push(eq(listings.bathrooms, filters.bathrooms));
    if (filters.availability !== undefined) {
      conditions.push(eq(listings.availability, filters.availability));
    }

    if (filters.search) {
      const pattern = `%${filters.search}%`;
      const matches = or(
        ilike(listings.title, pattern),
        ilike(listings.description, pattern),
        ilike(listings.location, pattern),
        ilike(listings.amenities, pattern)
      );
      if (matches) conditions.push(matches);
    }

    if (filters.stay) {
      // Overlap: an existing stay starts before ours ends and ends after ours starts.
      const overlapping = db
        .select({ listingId: bookings.listingId })
        .from(bookings)
        .where(
          and(
            lt(bookings.checkInDate, filters.stay.checkOut),
            gt(bookings.checkOutDate, filters.stay.checkIn),
            inArray(bookings.status, ["pending", "confirmed"])
          )
        );
      conditions.push(not(inArray(listings.id, overlapping)));
    }

    return db
      .select()
      .from(listings)
      .where(and(...conditions))
      .orderBy(ORDERINGS[filters.ordering], desc(listings.id))
      .limit(filters.limit)
      .offset(filters.offset);
  }

  async findActiveById(listingId: string): Promise<ListingRecord | null> {
    const [row] = await db
      .select()
      .from(listings)
      .where(and(eq(listings.id, listingId), eq(listings.isActive, true)))
      .limit(1);
    return row ?? null;
  }

  async ratingSummary(listingId: string): Promise<ListingRatingSummary> {
    const [row] = await db
      .select({ average: avg(reviews.rating), total: count() })
      .from(reviews)
      .where(eq(reviews.listingId, listingId));

    return {
      averageRating: row?.average === null || row?.average === undefined ? null : Number(row.average),
      reviewsCount: Number(row?.total ?? 0),
    };
  }

  async latestReviews(listingId: string, limit: number): Promise<ReviewRecord[]> {
    return db
      .select()
      .from(reviews)
      .where(eq(reviews.listingId, listingId))
      .orderBy(desc(reviews.createdAt))
      .limit(limit);
  }

  async create(data: ListingInsert): Promise<ListingRecord> {
    const [row] = await db.insert(listings).values(data).returning();
    return row;
  }

  async update(listingId: string, update: ListingUpdate): Promise<ListingRecord | null> {
    const [row] = await db
      .update(listings)
      .set({ ...update, updatedAt: new Date() })
      .where(and(eq(listings.id, listingId), eq(listings.isActive, true)))
      .returning();
    return row ?? null;
  }

  // Soft delete.
  async deactivate(listingId: string): Promise<void> {
    await db
      .update(listings)
      .set({ isActive: false, updatedAt: new Date() })
      .where(eq(listings.id, listingId));
  }
}
