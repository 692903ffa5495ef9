import { and, desc, eq, inArray, isNull, type SQL } from "drizzle-orm";

import { db } from "../../core/database/client";
import { bookings } from "../bookings/bookings.schema";
import { listings } from "../listings/listings.schema";
import { payments } from "../payments/payments.schema";
import { users } from "../users/users.schema";

import { notifications, type NotificationInsert, type NotificationRow } from "./notifications.schema";

export type NotificationListFilters = {
  userId: string;
  unreadOnly?: boolean;
  limit: number;
  offset: number;
};

export type BookingNotificationContext = {
  userId: string;
  recipientName: string;
  bookingId: string;
  listingTitle: string;
  listingLocation: string;
  checkInDate: string;
  checkOutDate: string;
  numGuests: number;
  totalPrice: string;
};

export type PaymentNotificationContext = BookingNotificationContext & {
  paymentId: string;
  amount: string;
  currency: string;
  failureReason: string | null;
};

export interface NotificationStore {
  insertNotification(payload: NotificationInsert): Promise<NotificationRow | null>;
  listNotifications(filters: NotificationListFilters): Promise<NotificationRow[]>;
  markRead(userId: string, ids: string[]): Promise<number>;
  findBookingContext(bookingId: string): Promise<BookingNotificationContext | null>;
  findPaymentContext(paymentId: string): Promise<PaymentNotificationContext | null>;
}

const bookingContextColumns = {
  userId: bookings.userId,
  firstName: users.firstName,
  username: users.username,
  bookingId: bookings.id,
  listingTitle: listings.title,
  listingLocation: listings.location,
  checkInDate: bookings.checkInDate,
  checkOutDate: bookings.checkOutDate,
  numGuests: bookings.numGuests,
  totalPrice: bookings.totalPrice,
};

export class NotificationsRepository implements NotificationStore {
  async insertNotification(payload: NotificationInsert): Promise<NotificationRow | null> {
    const [row] = await db
      .insert(notifications)
      .values(payload)
      .onConflictDoNothing()
      .returning();

    return row ?? null;
  }

  async listNotifications(filters: NotificationListFilters): Promise<NotificationRow[]> {
    const conditions: SQL[] = [eq(notifications.userId, filters.userId)];
    if (filters.unreadOnly) {
      conditions.push(isNull(notifications.readAt));
    }

    return db
      .select()
      .from(notifications)
      .where(and(...conditions))
      .orderBy(desc(notifications.createdAt), desc(notifications.id))
      .limit(filters.limit)
      .offset(filters.offset);
  }

  async markRead(userId: string, ids: string[]): Promise<number> {
    const rows = await db
      .update(notifications)
      .set({ readAt: new Date() })
      .where(
        and(
          eq(notifications.userId, userId),
          inArray(notifications.id, ids),
          isNull(notifications.readAt)
        )
      )
      .returning({ id: notifications.id });

    return rows.length;
  }

  async findBookingContext(bookingId: string): Promise<BookingNotificationContext | null> {
    const [row] = await db
      .select(bookingContextColumns)
      .from(bookings)
      .innerJoin(listings, eq(listings.id, bookings.listingId))
      .innerJoin(users, eq(users.id, bookings.userId))
      .where(eq(bookings.id, bookingId))
      .limit(1);

    if (!row) return null;
    const { firstName, username, ...context } = row;
    return { ...context, recipientName: firstName || username };
  }

  async findPaymentContext(paymentId: string): Promise<PaymentNotificationContext | null> {
    const [row] = await db
      .select({
        ...bookingContextColumns,
        paymentId: payments.id,
        amount: payments.amount,
        currency: payments.currency,
        failureReason: payments.failureReason,
      })
      .from(payments)
      .innerJoin(bookings, eq(bookings.id, payments.bookingId))
      .innerJoin(listings, eq(listings.id, bookings.listingId))
      .innerJoin(users, eq(users.id, bookings.userId))
      .where(eq(payments.id, paymentId))
      .limit(1);

    if (!row) return null;
    const { firstName, username, ...context } = row;
    return { ...context, recipientName: firstName || username };
  }
}
