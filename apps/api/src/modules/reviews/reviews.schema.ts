import { integer, pgTable, text, timestamp, uniqueIndex, uuid } from "drizzle-orm/pg-core";

import { bookings } from "../bookings/bookings.schema";
import { listings } from "../listings/listings.schema";
import { users } from "../users/users.schema";

export const reviews = pgTable(
  "reviews",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    listingId: uuid("listing_id").references(() => listings.id, { onDelete: "cascade" }).notNull(),
    userId: uuid("user_id").references(() => users.id, { onDelete: "cascade" }).notNull(),
    bookingId: uuid("booking_id")
      .references(() => bookings.id, { onDelete: "cascade" })
      .unique(),
    rating: integer("rating").notNull(),
    comment: text("comment").notNull(),
    cleanlinessRating: integer("cleanliness_rating"),
    accuracyRating: integer("accuracy_rating"),
    locationRating: integer("location_rating"),
    valueRating: integer("value_rating"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    listingUserIdx: uniqueIndex("reviews_listing_user_idx").on(table.listingId, table.userId),
  })
);

export type ReviewRecord = typeof reviews.$inferSelect;
export type ReviewInsert = typeof reviews.$inferInsert;
