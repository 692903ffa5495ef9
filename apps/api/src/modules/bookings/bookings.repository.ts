import { and, desc, eq, type SQL } from "drizzle-orm";

import { db } from "../../core/database/client";
import { listings, type ListingRecord } from "../listings/listings.schema";
import type { BookingStatus } from "../payments/payment-status";
import type { PayableBooking, PayableBookingSource } from "../payments/payments.service";
import { users } from "../users/users.schema";

import { bookings, type BookingInsert, type BookingRecord } from "./bookings.schema";

export type BookingListFilters = {
  userId?: string;
  status?: BookingStatus;
  listingId?: string;
};

export type CancelBookingResult =
  | { status: "not_found" }
  | { status: "not_cancellable"; current: BookingStatus }
  | { status: "cancelled"; booking: BookingRecord };

const NON_CANCELLABLE: ReadonlySet<BookingStatus> = new Set(["cancelled", "completed"]);

export interface BookingStore extends PayableBookingSource {
  findListing(listingId: string): Promise<ListingRecord | null>;
  create(data: BookingInsert): Promise<BookingRecord>;
  findById(bookingId: string): Promise<BookingRecord | null>;
  list(filters: BookingListFilters): Promise<BookingRecord[]>;
  cancel(bookingId: string, userId: string | null): Promise<CancelBookingResult>;
}

export class BookingsRepository implements BookingStore {
  async findListing(listingId: string): Promise<ListingRecord | null> {
    const [row] = await db
      .select()
      .from(listings)
      .where(and(eq(listings.id, listingId), eq(listings.isActive, true)))
      .limit(1);
    return row ?? null;
  }

  async create(data: BookingInsert): Promise<BookingRecord> {
    const [row] = await db.insert(bookings).values(data).returning();
    return row;
  }

  async findById(bookingId: string): Promise<BookingRecord | null> {
    const [row] = await db.select().from(bookings).where(eq(bookings.id, bookingId)).limit(1);
    return row ?? null;
  }

  async list(filters: BookingListFilters): Promise<BookingRecord[]> {
    const conditions: SQL[] = [];
    if (filters.userId) conditions.push(eq(bookings.userId, filters.userId));
    if (filters.status) conditions.push(eq(bookings.status, filters.status));
    if (filters.listingId) conditions.push(eq(bookings.listingId, filters.listingId));

    return db
      .select()
      .from(bookings)
      .where(conditions.length ? and(...conditions) : undefined)
      .orderBy(desc(bookings.createdAt));
  }

  // Locks the booking row, so a cancellation serializes with payment settlement.
  async cancel(bookingId: string, userId: string | null): Promise<CancelBookingResult> {
    return db.transaction(async (tx) => {
      const [booking] = await tx
        .select()
        .from(bookings)
        .where(eq(bookings.id, bookingId))
        .limit(1)
        .for("update");

      if (!booking || (userId !== null && booking.userId !== userId)) {
        return { status: "not_found" };
      }
      if (NON_CANCELLABLE.has(booking.status)) {
        return { status: "not_cancellable", current: booking.status };
      }

      const [updated] = await tx
        .update(bookings)
        .set({ status: "cancelled", updatedAt: new Date() })
        .where(eq(bookings.id, bookingId))
        .returning();

      return { status: "cancelled", booking: updated };
    });
  }

  async findPayableBooking(bookingId: string): Promise<PayableBooking | null> {
    const [row] = await db
      .select({
        id: bookings.id,
        userId: bookings.userId,
        listingId: bookings.listingId,
        listingTitle: listings.title,
        status: bookings.status,
        totalPrice: bookings.totalPrice,
        email: users.email,
        username: users.username,
        firstName: users.firstName,
        lastName: users.lastName,
        phoneNumber: users.phoneNumber,
      })
      .from(bookings)
      .innerJoin(listings, eq(listings.id, bookings.listingId))
      .innerJoin(users, eq(users.id, bookings.userId))
      .where(eq(bookings.id, bookingId))
      .limit(1);

    if (!row) return null;
    const { email, username, firstName, lastName, phoneNumber, ...booking } = row;
    return { ...booking, guest: { email, username, firstName, lastName, phoneNumber } };
  }
}
