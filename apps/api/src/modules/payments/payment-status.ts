import { BookingStatusSchema, PaymentStatusSchema } from "@tripnest/shared-schema";
import type { z } from "zod";

export type PaymentStatus = z.infer<typeof PaymentStatusSchema>;
export type BookingStatus = z.infer<typeof BookingStatusSchema>;

export const PAYMENT_STATUSES = PaymentStatusSchema.options;
export const BOOKING_STATUSES = BookingStatusSchema.options;

export type NotificationEvent =
  | { type: "payment_confirmed"; paymentId: string }
  | { type: "payment_failed"; paymentId: string; reason: string }
  | { type: "booking_awaiting_payment"; bookingId: string };

export type GatewayVerificationResult = {
  rawStatus: string;
  amount: string | null;
  currency: string | null;
  gatewayTransactionId: string | null;
  gatewayReference: string | null;
  failureReason: string | null;
  raw: unknown;
};

const GATEWAY_STATUS_MAP = new Map<string, PaymentStatus>([
  ["success", "completed"],
  ["pending", "processing"],
  ["failed", "failed"],
  ["cancelled", "cancelled"],
]);

export type GatewayStatusMapping = {
  status: PaymentStatus;
  recognized: boolean;
};

/**
 * The only translation from gateway status text to {@link PaymentStatus}.
 * Anything unrecognized resolves to `failed` so an unknown state is never
 * read as a settlement.
 */
export function mapGatewayStatus(rawStatus: string | null | undefined): GatewayStatusMapping {
  const key = (rawStatus ?? "").trim().toLowerCase();
  const status = GATEWAY_STATUS_MAP.get(key);
  if (status) {
    return { status, recognized: true };
  }
  return { status: "failed", recognized: false };
}
