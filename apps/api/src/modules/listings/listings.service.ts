import type {
  ListingCreateInput,
  ListingsQuery,
  ListingUpdateInput,
} from "@tripnest/shared-schema";

import { AppError, badRequest, notFound } from "../../core/errors";
import { logger } from "../../core/logger";
import { parseDateOnly } from "../bookings/booking-rules";
import { toReviewDto, type ReviewDto } from "../reviews/reviews.service";
import type { Actor } from "../users/users.schema";

import type { ListingSearchFilters, ListingStore } from "./listings.repository";
import type { ListingRecord } from "./listings.schema";

const LATEST_REVIEWS_LIMIT = 5;

export type ListingDto = {
  id: string;
  title: string;
  description: string;
  location: string;
  pricePerNight: string;
  maxGuests: number;
  bedrooms: number;
  bathrooms: number;
  amenities: string[];
  availability: boolean;
  createdById: string;
  createdAt: string;
  updatedAt: string;
};

export type ListingDetailDto = ListingDto & {
  averageRating: number;
  reviewsCount: number;
  latestReviews: ReviewDto[];
};

export function splitAmenities(amenities: string): string[] {
  return amenities
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

function toListingDto(listing: ListingRecord): ListingDto {
  return {
    id: listing.id,
    title: listing.title,
    description: listing.description,
    location: listing.location,
    pricePerNight: listing.pricePerNight,
    maxGuests: listing.maxGuests,
    bedrooms: listing.bedrooms,
    bathrooms: listing.bathrooms,
    amenities: splitAmenities(listing.amenities),
    availability: listing.availability,
    createdById: listing.createdById,
    createdAt: listing.createdAt.toISOString(),
    updatedAt: listing.updatedAt.toISOString(),
  };
}

export class ListingsService {
  constructor(private readonly repository: ListingStore) {}

  async listListings(query: ListingsQuery): Promise<ListingDto[]> {
    const records = await this.repository.search(this.toFilters(query));
    return records.map(toListingDto);
  }

  async listAvailable(query: ListingsQuery): Promise<ListingDto[]> {
    if (!query.checkIn || !query.checkOut) {
      throw badRequest("check_in_and_check_out_required");
    }
    return this.listListings(query);
  }

  async getListing(listingId: string): Promise<ListingDetailDto> {
    const listing = await this.repository.findActiveById(listingId);
    if (!listing) {
      throw notFound("listing_not_found");
    }

    const [summary, latest] = await Promise.all([
      this.repository.ratingSummary(listingId),
      this.repository.latestReviews(listingId, LATEST_REVIEWS_LIMIT),
    ]);

    return {
      ...toListingDto(listing),
      averageRating:
        summary.averageRating === null ? 0 : Math.round(summary.averageRating * 10) / 10,
      reviewsCount: summary.reviewsCount,
      latestReviews: latest.map(toReviewDto),
    };
  }

  async createListing(actor: Actor, input: ListingCreateInput): Promise<ListingDto> {
    const listing = await this.repository.create({ ...input, createdById: actor.userId });
    logger.info("[Listings] Listing created", { module: "listings", listingId: listing.id });
    return toListingDto(listing);
  }

  async updateListing(
    actor: Actor,
    listingId: string,
    input: ListingUpdateInput
  ): Promise<ListingDto> {
    await this.getManagedListing(actor, listingId);
    const updated = await this.repository.update(listingId, input);
    if (!updated) {
      throw notFound("listing_not_found");
    }
    return toListingDto(updated);
  }

  async deleteListing(actor: Actor, listingId: string): Promise<void> {
    await this.getManagedListing(actor, listingId);
    await this.repository.deactivate(listingId);
    logger.info("[Listings] Listing deactivated", { module: "listings", listingId });
  }

  private async getManagedListing(actor: Actor, listingId: string): Promise<ListingRecord> {
    const listing = await this.repository.findActiveById(listingId);
    if (!listing) {
      throw notFound("listing_not_found");
    }
    if (actor.role !== "admin" && listing.createdById !== actor.userId) {
      throw new AppError(403, "Only the listing owner can change it", "forbidden");
    }
    return listing;
  }

  private toFilters(query: ListingsQuery): ListingSearchFilters {
    let stay: ListingSearchFilters["stay"];
    if (query.checkIn && query.checkOut) {
      const checkIn = parseDateOnly(query.checkIn);
      const checkOut = parseDateOnly(query.checkOut);
      if (checkIn === null || checkOut === null || checkOut <= checkIn) {
        throw badRequest("invalid_stay_dates");
      }
      stay = { checkIn: query.checkIn, checkOut: query.checkOut };
    }

    return {
      location: query.location,
      search: query.search,
      minPrice: query.minPrice,
      maxPrice: query.maxPrice,
      maxGuests: query.maxGuests,
      bedrooms: query.bedrooms,
      bathrooms: query.bathrooms,
      availability: query.availability,
      stay,
      ordering: query.ordering,
      limit: query.limit,
      offset: query.offset,
    };
  }
}
