import { index, jsonb, pgTable, text, timestamp, uniqueIndex, uuid, varchar } from "drizzle-orm/pg-core";

import { users } from "../users/users.schema";

export const notifications = pgTable(
  "notifications",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    userId: uuid("user_id").references(() => users.id, { onDelete: "cascade" }).notNull(),
    type: varchar("type", { length: 64 }).notNull(),
    title: text("title").notNull(),
    message: text("message").notNull(),
    bookingId: uuid("booking_id"),
    paymentId: uuid("payment_id"),
    dedupeKey: text("dedupe_key").notNull(),
    metadata: jsonb("metadata"),
    readAt: timestamp("read_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    userCreatedIdx: index("notifications_user_created_idx").on(table.userId, table.createdAt),
    userReadIdx: index("notifications_user_read_idx").on(table.userId, table.readAt),
    dedupeIdx: uniqueIndex("notifications_dedupe_idx").on(table.dedupeKey),
  })
);

export type NotificationRow = typeof notifications.$inferSelect;
export type NotificationInsert = typeof notifications.$inferInsert;
