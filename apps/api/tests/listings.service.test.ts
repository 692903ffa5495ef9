import { ListingsQuerySchema } from "@tripnest/shared-schema";
import { describe, expect, it } from "vitest";

import type {
  ListingRatingSummary,
  ListingSearchFilters,
  ListingStore,
  ListingUpdate,
} from "../src/modules/listings/listings.repository";
import type { ListingInsert, ListingRecord } from "../src/modules/listings/listings.schema";
import { ListingsService, splitAmenities } from "../src/modules/listings/listings.service";
import type { ReviewRecord } from "../src/modules/reviews/reviews.schema";
import type { Actor } from "../src/modules/users/users.schema";

const HOST: Actor = { userId: "a1111111-1111-4111-8111-111111111111", role: "traveler" };
const OTHER: Actor = { userId: "a2222222-2222-4222-8222-222222222222", role: "traveler" };
const ADMIN: Actor = { userId: "a3333333-3333-4333-8333-333333333333", role: "admin" };
const LISTING_ID = "c0000000-0000-4000-8000-000000000001";
const CREATED_AT = new Date("2026-01-01T00:00:00.000Z");

function listingRecord(overrides: Partial<ListingRecord> = {}): ListingRecord {
  return {
    id: LISTING_ID,
    title: "Lakeside cabin",
    description: "Two rooms by the lake",
    location: "Bahir Dar",
    pricePerNight: "150.00",
    createdById: HOST.userId,
    maxGuests: 4,
    bedrooms: 2,
    bathrooms: 1,
    amenities: "wifi, parking,,kitchen",
    availability: true,
    isActive: true,
    createdAt: CREATED_AT,
    updatedAt: CREATED_AT,
    ...overrides,
  };
}

function reviewRecord(rating: number, index: number): ReviewRecord {
  return {
    id: `e0000000-0000-4000-8000-00000000000${index}`,
    listingId: LISTING_ID,
    userId: OTHER.userId,
    bookingId: null,
    rating,
    comment: `Review ${index}`,
    cleanlinessRating: null,
    accuracyRating: null,
    locationRating: null,
    valueRating: null,
    createdAt: CREATED_AT,
    updatedAt: CREATED_AT,
  };
}

class FakeListingStore implements ListingStore {
  listings = new Map<string, ListingRecord>([[LISTING_ID, listingRecord()]]);
  reviews: ReviewRecord[] = [];
  searches: ListingSearchFilters[] = [];

  async search(filters: ListingSearchFilters): Promise<ListingRecord[]> {
    this.searches.push(filters);
    return [...this.listings.values()].filter((listing) => listing.isActive);
  }

  async findActiveById(listingId: string): Promise<ListingRecord | null> {
    const listing = this.listings.get(listingId);
    return listing && listing.isActive ? listing : null;
  }

  async ratingSummary(): Promise<ListingRatingSummary> {
    if (!this.reviews.length) return { averageRating: null, reviewsCount: 0 };
    const total = this.reviews.reduce((sum, review) => sum + review.rating, 0);
    return { averageRating: total / this.reviews.length, reviewsCount: this.reviews.length };
  }

  async latestReviews(_listingId: string, limit: number): Promise<ReviewRecord[]> {
    return this.reviews.slice(0, limit);
  }

  async create(data: ListingInsert): Promise<ListingRecord> {
    const record = listingRecord({
      id: "c0000000-0000-4000-8000-000000000002",
      title: data.title,
      description: data.description,
      location: data.location,
      pricePerNight: data.pricePerNight,
      createdById: data.createdById,
      amenities: data.amenities ?? "",
    });
    this.listings.set(record.id, record);
    return record;
  }

  async update(listingId: string, update: ListingUpdate): Promise<ListingRecord | null> {
    const current = this.listings.get(listingId);
    if (!current) return null;
    const next = { ...current, ...update };
    this.listings.set(listingId, next);
    return next;
  }

  async deactivate(listingId: string): Promise<void> {
    const current = this.listings.get(listingId);
    if (current) this.listings.set(listingId, { ...current, isActive: false });
  }
}

function setup() {
  const store = new FakeListingStore();
  return { store, service: new ListingsService(store) };
}

describe("ListingsService", () => {
  it("splits amenities into a clean list", () => {
    expect(splitAmenities("wifi, parking,,kitchen")).toEqual(["wifi", "parking", "kitchen"]);
    expect(splitAmenities("")).toEqual([]);
  });

  it("passes parsed filters and the stay window to the store", async () => {
    const { store, service } = setup();
    const query = ListingsQuerySchema.parse({
      location: "Bahir Dar",
      minPrice: "100",
      checkIn: "2026-05-01",
      checkOut: "2026-05-04",
      ordering: "price_per_night",
    });

    const listings = await service.listListings(query);

    expect(listings[0].amenities).toEqual(["wifi", "parking", "kitchen"]);
    expect(store.searches[0]).toMatchObject({
      location: "Bahir Dar",
      minPrice: "100",
      stay: { checkIn: "2026-05-01", checkOut: "2026-05-04" },
      ordering: "price_per_night",
      limit: 50,
      offset: 0,
    });
  });

  it("rejects a reversed stay window", async () => {
    const { service } = setup();
    const query = ListingsQuerySchema.parse({ checkIn: "2026-05-04", checkOut: "2026-05-01" });

    await expect(service.listListings(query)).rejects.toMatchObject({
      statusCode: 400,
      code: "invalid_stay_dates",
    });
  });

  it("requires both dates for the availability search", async () => {
    const { service } = setup();

    await expect(
      service.listAvailable(ListingsQuerySchema.parse({ checkIn: "2026-05-01" }))
    ).rejects.toMatchObject({ statusCode: 400, code: "check_in_and_check_out_required" });
  });

  it("summarizes ratings on the detail view", async () => {
    const { store, service } = setup();
    store.reviews = [5, 4, 4, 3, 5, 2].map((rating, index) => reviewRecord(rating, index));

    const detail = await service.getListing(LISTING_ID);

    expect(detail.averageRating).toBe(3.8);
    expect(detail.reviewsCount).toBe(6);
    expect(detail.latestReviews).toHaveLength(5);
  });

  it("reports zero rating without reviews", async () => {
    const { service } = setup();

    const detail = await service.getListing(LISTING_ID);

    expect(detail.averageRating).toBe(0);
    expect(detail.reviewsCount).toBe(0);
    expect(detail.latestReviews).toEqual([]);
  });

  it("lets the owner or an admin change a listing", async () => {
    const { service } = setup();

    await expect(
      service.updateListing(OTHER, LISTING_ID, { title: "Mine now" })
    ).rejects.toMatchObject({ statusCode: 403, code: "forbidden" });

    expect((await service.updateListing(HOST, LISTING_ID, { title: "Lake house" })).title).toBe(
      "Lake house"
    );
    expect((await service.updateListing(ADMIN, LISTING_ID, { maxGuests: 6 })).maxGuests).toBe(6);
  });

  it("soft-deletes a listing", async () => {
    const { store, service } = setup();

    await service.deleteListing(HOST, LISTING_ID);

    expect(store.listings.get(LISTING_ID)?.isActive).toBe(false);
    await expect(service.getListing(LISTING_ID)).rejects.toMatchObject({
      statusCode: 404,
      code: "listing_not_found",
    });
  });

  it("records the creator", async () => {
    const { service } = setup();

    const created = await service.createListing(HOST, {
      title: "City loft",
      description: "Near the square",
      location: "Addis Ababa",
      pricePerNight: "80.00",
      maxGuests: 2,
      bedrooms: 1,
      bathrooms: 1,
      amenities: "wifi",
      availability: true,
    });

    expect(created).toMatchObject({
      title: "City loft",
      createdById: HOST.userId,
      amenities: ["wifi"],
    });
  });
});
