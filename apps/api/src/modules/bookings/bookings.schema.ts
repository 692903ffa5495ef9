import {
  date,
  index,
  integer,
  numeric,
  pgEnum,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
} from "drizzle-orm/pg-core";

import { BOOKING_STATUSES } from "../payments/payment-status";
import { listings } from "../listings/listings.schema";
import { users } from "../users/users.schema";

export const bookingStatusEnum = pgEnum("booking_status", BOOKING_STATUSES);

export const bookings = pgTable(
  "bookings",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    listingId: uuid("listing_id").references(() => listings.id, { onDelete: "cascade" }).notNull(),
    userId: uuid("user_id").references(() => users.id, { onDelete: "cascade" }).notNull(),
    checkInDate: date("check_in_date").notNull(),
    checkOutDate: date("check_out_date").notNull(),
    numGuests: integer("num_guests").notNull().default(1),
    totalPrice: numeric("total_price", { precision: 10, scale: 2 }).notNull(),
    status: bookingStatusEnum("status").notNull().default("pending"),
    specialRequests: text("special_requests").notNull().default(""),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    stayIdx: uniqueIndex("bookings_listing_stay_idx").on(
      table.listingId,
      table.checkInDate,
      table.checkOutDate
    ),
    userIdx: index("bookings_user_idx").on(table.userId, table.createdAt),
  })
);

export type BookingRecord = typeof bookings.$inferSelect;
export type BookingInsert = typeof bookings.$inferInsert;
