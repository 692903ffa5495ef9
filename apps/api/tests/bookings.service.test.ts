import { randomUUID } from "crypto";
import { beforeEach, describe, expect, it } from "vitest";

import { getCounter, resetMetrics } from "../src/core/metrics";
import type {
  BookingListFilters,
  BookingStore,
  CancelBookingResult,
} from "../src/modules/bookings/bookings.repository";
import type { BookingInsert, BookingRecord } from "../src/modules/bookings/bookings.schema";
import { BookingsService } from "../src/modules/bookings/bookings.service";
import type { ListingRecord } from "../src/modules/listings/listings.schema";
import type { PayableBooking } from "../src/modules/payments/payments.service";
import type { Actor } from "../src/modules/users/users.schema";

import { RecordingNotifier } from "./support/payment-fakes";

const GUEST: Actor = { userId: "a1111111-1111-4111-8111-111111111111", role: "traveler" };
const OTHER: Actor = { userId: "a2222222-2222-4222-8222-222222222222", role: "traveler" };
const ADMIN: Actor = { userId: "a3333333-3333-4333-8333-333333333333", role: "admin" };
const LISTING_ID = "c0000000-0000-4000-8000-000000000001";

const listing: ListingRecord = {
  id: LISTING_ID,
  title: "Lakeside cabin",
  description: "Two rooms by the lake",
  location: "Bahir Dar",
  pricePerNight: "150.00",
  createdById: ADMIN.userId,
  maxGuests: 4,
  bedrooms: 2,
  bathrooms: 1,
  amenities: "wifi,parking",
  availability: true,
  isActive: true,
  createdAt: new Date("2026-01-01T00:00:00.000Z"),
  updatedAt: new Date("2026-01-01T00:00:00.000Z"),
};

class UniqueViolation extends Error {
  readonly code = "23505";
}

class FakeBookingStore implements BookingStore {
  listings = new Map<string, ListingRecord>([[LISTING_ID, listing]]);
  bookings = new Map<string, BookingRecord>();

  async findListing(listingId: string): Promise<ListingRecord | null> {
    return this.listings.get(listingId) ?? null;
  }

  async create(data: BookingInsert): Promise<BookingRecord> {
    const clash = [...this.bookings.values()].some(
      (booking) =>
        booking.listingId === data.listingId &&
        booking.checkInDate === data.checkInDate &&
        booking.checkOutDate === data.checkOutDate
    );
    if (clash) throw new UniqueViolation("duplicate key value violates unique constraint");

    const now = new Date("2026-04-01T12:00:00.000Z");
    const record: BookingRecord = {
      id: data.id ?? randomUUID(),
      listingId: data.listingId,
      userId: data.userId,
      checkInDate: data.checkInDate,
      checkOutDate: data.checkOutDate,
      numGuests: data.numGuests ?? 1,
      totalPrice: data.totalPrice,
      status: data.status ?? "pending",
      specialRequests: data.specialRequests ?? "",
      createdAt: now,
      updatedAt: now,
    };
    this.bookings.set(record.id, record);
    return record;
  }

  async findById(bookingId: string): Promise<BookingRecord | null> {
    return this.bookings.get(bookingId) ?? null;
  }

  async list(filters: BookingListFilters): Promise<BookingRecord[]> {
    return [...this.bookings.values()].filter(
      (booking) =>
        (!filters.userId || booking.userId === filters.userId) &&
        (!filters.status || booking.status === filters.status) &&
        (!filters.listingId || booking.listingId === filters.listingId)
    );
  }

  async cancel(bookingId: string, userId: string | null): Promise<CancelBookingResult> {
    const booking = this.bookings.get(bookingId);
    if (!booking || (userId !== null && booking.userId !== userId)) {
      return { status: "not_found" };
    }
    if (booking.status === "cancelled" || booking.status === "completed") {
      return { status: "not_cancellable", current: booking.status };
    }
    const updated: BookingRecord = { ...booking, status: "cancelled" };
    this.bookings.set(bookingId, updated);
    return { status: "cancelled", booking: updated };
  }

  async findPayableBooking(): Promise<PayableBooking | null> {
    return null;
  }
}

const stay = {
  listingId: LISTING_ID,
  checkInDate: "2026-05-01",
  checkOutDate: "2026-05-04",
  numGuests: 2,
  specialRequests: "",
};

function setup() {
  const store = new FakeBookingStore();
  const notifier = new RecordingNotifier();
  const service = new BookingsService(store, notifier, () => new Date("2026-04-01T12:00:00.000Z"));
  return { store, notifier, service };
}

describe("BookingsService.createBooking", () => {
  beforeEach(() => {
    resetMetrics();
  });

  it("prices the stay and announces the pending booking", async () => {
    const { notifier, service } = setup();

    const booking = await service.createBooking(GUEST, stay);

    expect(booking).toMatchObject({
      listingId: LISTING_ID,
      userId: GUEST.userId,
      status: "pending",
      totalPrice: "450.00",
      durationDays: 3,
      numGuests: 2,
    });
    expect(notifier.events).toEqual([{ type: "booking_awaiting_payment", bookingId: booking.id }]);
    expect(getCounter("booking_created_total")).toBe(1);
  });

  it("returns 404 for an unknown listing", async () => {
    const { service } = setup();

    await expect(
      service.createBooking(GUEST, { ...stay, listingId: "c0000000-0000-4000-8000-00000000ffff" })
    ).rejects.toMatchObject({ statusCode: 404, code: "listing_not_found" });
  });

  it("explains a guest count above the listing maximum", async () => {
    const { notifier, service } = setup();

    await expect(service.createBooking(GUEST, { ...stay, numGuests: 6 })).rejects.toMatchObject({
      statusCode: 400,
      code: "too_many_guests",
      message: "Number of guests exceeds the listing maximum",
      details: { maxGuests: 4 },
    });
    expect(notifier.events).toEqual([]);
  });

  it("rejects stays that start in the past", async () => {
    const { service } = setup();

    await expect(
      service.createBooking(GUEST, { ...stay, checkInDate: "2026-03-28", checkOutDate: "2026-03-30" })
    ).rejects.toMatchObject({ statusCode: 400, code: "check_in_in_past", details: undefined });
  });

  it("rejects reversed dates", async () => {
    const { service } = setup();

    await expect(
      service.createBooking(GUEST, { ...stay, checkInDate: "2026-05-04", checkOutDate: "2026-05-01" })
    ).rejects.toMatchObject({ statusCode: 400, code: "invalid_stay_dates" });
  });

  it("reports a taken stay as a conflict", async () => {
    const { service } = setup();
    await service.createBooking(GUEST, stay);

    await expect(service.createBooking(OTHER, stay)).rejects.toMatchObject({
      statusCode: 409,
      code: "booking_dates_taken",
    });
  });

  it("keeps the booking when the notification fails", async () => {
    const { store, notifier, service } = setup();
    notifier.failure = new Error("queue full");

    const booking = await service.createBooking(GUEST, stay);

    expect(store.bookings.get(booking.id)?.status).toBe("pending");
    expect(getCounter("notification_dispatch_failed_total")).toBe(1);
  });
});

describe("BookingsService cancellation and reads", () => {
  it("cancels the guest's own booking", async () => {
    const { service } = setup();
    const booking = await service.createBooking(GUEST, stay);

    const cancelled = await service.cancelBooking(GUEST, booking.id);

    expect(cancelled.status).toBe("cancelled");
  });

  it("hides other guests' bookings from cancellation", async () => {
    const { service } = setup();
    const booking = await service.createBooking(GUEST, stay);

    await expect(service.cancelBooking(OTHER, booking.id)).rejects.toMatchObject({
      statusCode: 404,
      code: "booking_not_found",
    });
    expect((await service.cancelBooking(ADMIN, booking.id)).status).toBe("cancelled");
  });

  it("refuses to cancel twice", async () => {
    const { service } = setup();
    const booking = await service.createBooking(GUEST, stay);
    await service.cancelBooking(GUEST, booking.id);

    await expect(service.cancelBooking(GUEST, booking.id)).rejects.toMatchObject({
      statusCode: 400,
      code: "booking_not_cancellable",
      message: "Cannot cancel a booking that is already cancelled",
    });
  });

  it("lists only the guest's bookings unless the caller is an admin", async () => {
    const { service } = setup();
    await service.createBooking(GUEST, stay);
    await service.createBooking(OTHER, { ...stay, checkInDate: "2026-06-01", checkOutDate: "2026-06-03" });

    expect(await service.listBookings(GUEST, {})).toHaveLength(1);
    expect(await service.listBookings(ADMIN, {})).toHaveLength(2);
  });

  it("returns 404 for someone else's booking", async () => {
    const { service } = setup();
    const booking = await service.createBooking(GUEST, stay);

    await expect(service.getBooking(OTHER, booking.id)).rejects.toMatchObject({ statusCode: 404 });
    expect((await service.getBooking(GUEST, booking.id)).id).toBe(booking.id);
  });
});
