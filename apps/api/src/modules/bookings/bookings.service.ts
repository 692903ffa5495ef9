import type { BookingCreateInput, BookingsQuery } from "@tripnest/shared-schema";

import { AppError, badRequest, conflict, isUniqueViolation, notFound } from "../../core/errors";
import { logger } from "../../core/logger";
import { incrementCounter } from "../../core/metrics";
import { dispatchEvents, type Notifier } from "../notifications/notifier";
import type { Actor } from "../users/users.schema";

import {
  computeTotalPrice,
  findBookingRuleViolation,
  formatDateOnly,
  stayNights,
} from "./booking-rules";
import type { BookingStore } from "./bookings.repository";
import type { BookingRecord } from "./bookings.schema";

export type BookingDto = {
  id: string;
  listingId: string;
  userId: string;
  checkInDate: string;
  checkOutDate: string;
  numGuests: number;
  totalPrice: string;
  status: BookingRecord["status"];
  specialRequests: string;
  durationDays: number;
  createdAt: string;
  updatedAt: string;
};

const RULE_MESSAGES = {
  invalid_stay_dates: "Check-out date must be after check-in date",
  check_in_in_past: "Check-in date cannot be in the past",
  too_many_guests: "Number of guests exceeds the listing maximum",
  listing_unavailable: "Listing is not available for booking",
} as const;

export class BookingsService {
  constructor(
    private readonly repository: BookingStore,
    private readonly notifier: Notifier,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async createBooking(actor: Actor, input: BookingCreateInput): Promise<BookingDto> {
    const listing = await this.repository.findListing(input.listingId);
    if (!listing) {
      throw notFound("listing_not_found");
    }

    const violation = findBookingRuleViolation({
      checkInDate: input.checkInDate,
      checkOutDate: input.checkOutDate,
      numGuests: input.numGuests,
      today: formatDateOnly(this.clock()),
      listing,
    });
    if (violation) {
      const details =
        violation === "too_many_guests" ? { maxGuests: listing.maxGuests } : undefined;
      throw new AppError(400, RULE_MESSAGES[violation], violation, details);
    }

    const nights = stayNights(input.checkInDate, input.checkOutDate);
    const totalPrice = computeTotalPrice(listing.pricePerNight, nights);
    if (!totalPrice) {
      throw badRequest("invalid_stay_dates");
    }

    let booking: BookingRecord;
    try {
      booking = await this.repository.create({
        listingId: listing.id,
        userId: actor.userId,
        checkInDate: input.checkInDate,
        checkOutDate: input.checkOutDate,
        numGuests: input.numGuests,
        totalPrice,
        status: "pending",
        specialRequests: input.specialRequests,
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw conflict("booking_dates_taken");
      }
      throw error;
    }

    incrementCounter("booking_created_total");
    logger.info("[Bookings] Booking created", {
      module: "bookings",
      bookingId: booking.id,
      listingId: listing.id,
      nights,
    });

    await dispatchEvents(
      this.notifier,
      [{ type: "booking_awaiting_payment", bookingId: booking.id }],
      "bookings"
    );

    return this.toDto(booking);
  }

  async cancelBooking(actor: Actor, bookingId: string): Promise<BookingDto> {
    const result = await this.repository.cancel(
      bookingId,
      actor.role === "admin" ? null : actor.userId
    );

    if (result.status === "not_found") {
      throw notFound("booking_not_found");
    }
    if (result.status === "not_cancellable") {
      throw new AppError(
        400,
        `Cannot cancel a booking that is already ${result.current}`,
        "booking_not_cancellable"
      );
    }

    incrementCounter("booking_cancelled_total");
    logger.info("[Bookings] Booking cancelled", { module: "bookings", bookingId });
    return this.toDto(result.booking);
  }

  async listBookings(actor: Actor, query: BookingsQuery): Promise<BookingDto[]> {
    const records = await this.repository.list({
      userId: actor.role === "admin" ? undefined : actor.userId,
      status: query.status,
      listingId: query.listingId,
    });
    return records.map((record) => this.toDto(record));
  }

  async getBooking(actor: Actor, bookingId: string): Promise<BookingDto> {
    const booking = await this.repository.findById(bookingId);
    if (!booking || (actor.role !== "admin" && booking.userId !== actor.userId)) {
      throw notFound("booking_not_found");
    }
    return this.toDto(booking);
  }

  private toDto(booking: BookingRecord): BookingDto {
    return {
      id: booking.id,
      listingId: booking.listingId,
      userId: booking.userId,
      checkInDate: booking.checkInDate,
      checkOutDate: booking.checkOutDate,
      numGuests: booking.numGuests,
      totalPrice: booking.totalPrice,
      status: booking.status,
      specialRequests: booking.specialRequests,
      durationDays: stayNights(booking.checkInDate, booking.checkOutDate),
      createdAt: booking.createdAt.toISOString(),
      updatedAt: booking.updatedAt.toISOString(),
    };
  }
}
