import { pgEnum, pgTable, timestamp, uuid, varchar } from "drizzle-orm/pg-core";

export const userRoleEnum = pgEnum("user_role", ["admin", "traveler"]);

// Accounts are provisioned by the identity service; this service only reads them.
export const users = pgTable("users", {
  id: uuid("id").primaryKey().defaultRandom(),
  email: varchar("email", { length: 255 }).notNull().unique(),
  username: varchar("username", { length: 150 }).notNull().unique(),
  firstName: varchar("first_name", { length: 150 }).notNull().default(""),
  lastName: varchar("last_name", { length: 150 }).notNull().default(""),
  phoneNumber: varchar("phone_number", { length: 32 }),
  role: userRoleEnum("role").notNull().default("traveler"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});

export type UserRecord = typeof users.$inferSelect;
export type UserRole = (typeof userRoleEnum.enumValues)[number];

export type Actor = {
  userId: string;
  role: UserRole;
};
