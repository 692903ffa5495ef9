import { and, desc, eq, type SQL } from "drizzle-orm";

import { db, type DbSession } from "../../core/database/client";
import { AppError } from "../../core/errors";
import { bookings } from "../bookings/bookings.schema";

import type { BookingStatus, PaymentStatus } from "./payment-status";
import {
  paymentAnomalies,
  payments,
  type PaymentInsert,
  type PaymentRecord,
} from "./payments.schema";
import type { ReconcileAnomaly } from "./reconciler";

export type PaymentTrigger = "webhook" | "manual";

export type PaymentListFilters = {
  userId?: string;
  status?: PaymentStatus;
  method?: PaymentRecord["method"];
  bookingId?: string;
};

export type PaymentSettlementUpdate = {
  status: PaymentStatus;
  paidAt?: Date;
  gatewayTransactionId: string | null;
  gatewayReference: string | null;
  failureReason: string | null;
  gatewayResponse: unknown;
};

export type PaymentLockState = {
  payment: PaymentRecord;
  bookingStatus: BookingStatus;
};

/** Writes allowed while a payment and its booking are locked. */
export interface PaymentLockWriter {
  updatePayment(update: PaymentSettlementUpdate): Promise<PaymentRecord>;
  updateBookingStatus(status: BookingStatus): Promise<void>;
  recordAnomalies(anomalies: ReconcileAnomaly[], trigger: PaymentTrigger): Promise<void>;
}

export interface PaymentLedger {
  findById(paymentId: string): Promise<PaymentRecord | null>;
  findByTxRef(txRef: string): Promise<PaymentRecord | null>;
  findByBookingId(bookingId: string): Promise<PaymentRecord | null>;
  list(filters: PaymentListFilters): Promise<PaymentRecord[]>;
  create(data: PaymentInsert): Promise<PaymentRecord>;
  /**
   * Runs `work` while holding row locks on the payment and its booking. State is
   * re-read under the lock, and everything `work` writes commits together.
   */
  withPaymentLock<T>(
    paymentId: string,
    work: (state: PaymentLockState, writer: PaymentLockWriter) => Promise<T>
  ): Promise<T>;
}

export class PaymentsRepository implements PaymentLedger {
  async findById(paymentId: string, client: DbSession = db): Promise<PaymentRecord | null> {
    const [row] = await client
      .select()
      .from(payments)
      .where(eq(payments.id, paymentId))
      .limit(1);
    return row ?? null;
  }

  async findByTxRef(txRef: string): Promise<PaymentRecord | null> {
    const [row] = await db.select().from(payments).where(eq(payments.txRef, txRef)).limit(1);
    return row ?? null;
  }

  async findByBookingId(bookingId: string): Promise<PaymentRecord | null> {
    const [row] = await db
      .select()
      .from(payments)
      .where(eq(payments.bookingId, bookingId))
      .limit(1);
    return row ?? null;
  }

  async list(filters: PaymentListFilters): Promise<PaymentRecord[]> {
    const conditions: SQL[] = [];
    if (filters.userId) conditions.push(eq(payments.userId, filters.userId));
    if (filters.status) conditions.push(eq(payments.status, filters.status));
    if (filters.method) conditions.push(eq(payments.method, filters.method));
    if (filters.bookingId) conditions.push(eq(payments.bookingId, filters.bookingId));

    return db
      .select()
      .from(payments)
      .where(conditions.length ? and(...conditions) : undefined)
      .orderBy(desc(payments.createdAt));
  }

  async create(data: PaymentInsert): Promise<PaymentRecord> {
    const [row] = await db.insert(payments).values(data).returning();
    return row;
  }

  async withPaymentLock<T>(
    paymentId: string,
    work: (state: PaymentLockState, writer: PaymentLockWriter) => Promise<T>
  ): Promise<T> {
    return db.transaction(async (tx) => {
      const [payment] = await tx
        .select()
        .from(payments)
        .where(eq(payments.id, paymentId))
        .limit(1)
        .for("update");
      if (!payment) {
        throw new AppError(404, "payment_not_found", "payment_not_found");
      }

      const [booking] = await tx
        .select({ id: bookings.id, status: bookings.status })
        .from(bookings)
        .where(eq(bookings.id, payment.bookingId))
        .limit(1)
        .for("update");
      if (!booking) {
        throw new AppError(404, "booking_not_found", "booking_not_found");
      }

      const writer: PaymentLockWriter = {
        updatePayment: async (update) => {
          const [row] = await tx
            .update(payments)
            .set({ ...update, updatedAt: new Date() })
            .where(eq(payments.id, payment.id))
            .returning();
          return row;
        },
        updateBookingStatus: async (status) => {
          await tx
            .update(bookings)
            .set({ status, updatedAt: new Date() })
            .where(eq(bookings.id, booking.id));
        },
        recordAnomalies: async (anomalies, trigger) => {
          if (!anomalies.length) return;
          await tx.insert(paymentAnomalies).values(
            anomalies.map((anomaly) => ({
              paymentId: payment.id,
              kind: anomaly.kind,
              trigger,
              details: anomaly,
            }))
          );
        },
      };

      return work({ payment, bookingStatus: booking.status }, writer);
    });
  }
}
