import {
  boolean,
  index,
  integer,
  numeric,
  pgTable,
  text,
  timestamp,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";

import { users } from "../users/users.schema";

export const listings = pgTable(
  "listings",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    title: varchar("title", { length: 200 }).notNull(),
    description: text("description").notNull(),
    location: varchar("location", { length: 100 }).notNull(),
    pricePerNight: numeric("price_per_night", { precision: 10, scale: 2 }).notNull(),
    createdById: uuid("created_by_id").references(() => users.id).notNull(),
    maxGuests: integer("max_guests").notNull().default(1),
    bedrooms: integer("bedrooms").notNull().default(1),
    bathrooms: integer("bathrooms").notNull().default(1),
    amenities: text("amenities").notNull().default(""),
    availability: boolean("availability").notNull().default(true),
    isActive: boolean("is_active").notNull().default(true),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    locationIdx: index("listings_location_idx").on(table.location),
    createdAtIdx: index("listings_created_at_idx").on(table.createdAt),
  })
);

export type ListingRecord = typeof listings.$inferSelect;
export type ListingInsert = typeof listings.$inferInsert;
