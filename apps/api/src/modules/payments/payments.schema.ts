import {
  index,
  jsonb,
  numeric,
  pgEnum,
  pgTable,
  text,
  timestamp,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";

import { PaymentMethodSchema } from "@tripnest/shared-schema";

import { bookings } from "../bookings/bookings.schema";
import { users } from "../users/users.schema";

import { PAYMENT_STATUSES } from "./payment-status";

export const paymentStatusEnum = pgEnum("payment_status", PAYMENT_STATUSES);
export const paymentMethodEnum = pgEnum("payment_method", PaymentMethodSchema.options);

export const payments = pgTable(
  "payments",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    bookingId: uuid("booking_id")
      .references(() => bookings.id, { onDelete: "cascade" })
      .notNull()
      .unique(),
    userId: uuid("user_id").references(() => users.id, { onDelete: "cascade" }).notNull(),
    amount: numeric("amount", { precision: 10, scale: 2 }).notNull(),
    currency: varchar("currency", { length: 3 }).notNull().default("ETB"),
    method: paymentMethodEnum("method").notNull().default("chapa"),
    status: paymentStatusEnum("status").notNull().default("pending"),
    txRef: varchar("tx_ref", { length: 100 }).unique(),
    checkoutUrl: text("checkout_url"),
    gatewayTransactionId: varchar("gateway_transaction_id", { length: 100 }),
    gatewayReference: varchar("gateway_reference", { length: 100 }),
    gatewayResponse: jsonb("gateway_response"),
    failureReason: text("failure_reason"),
    paidAt: timestamp("paid_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    statusIdx: index("payments_status_idx").on(table.status),
    createdAtIdx: index("payments_created_at_idx").on(table.createdAt),
  })
);

export const paymentAnomalies = pgTable(
  "payment_anomalies",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    paymentId: uuid("payment_id").references(() => payments.id, { onDelete: "cascade" }).notNull(),
    kind: varchar("kind", { length: 64 }).notNull(),
    trigger: varchar("trigger", { length: 32 }).notNull(),
    details: jsonb("details").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    paymentIdx: index("payment_anomalies_payment_idx").on(table.paymentId, table.createdAt),
  })
);

export type PaymentRecord = typeof payments.$inferSelect;
export type PaymentInsert = typeof payments.$inferInsert;
export type PaymentAnomalyRecord = typeof paymentAnomalies.$inferSelect;
