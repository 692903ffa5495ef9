import { formatMinorUnits, toMinorUnits } from "../../core/money";

import {
  mapGatewayStatus,
  type BookingStatus,
  type GatewayVerificationResult,
  type NotificationEvent,
  type PaymentStatus,
} from "./payment-status";

export const DEFAULT_FAILURE_REASON = "Payment was declined or cancelled";

export type ReconcileAnomaly =
  | { kind: "amount_mismatch"; expected: string; received: string }
  | { kind: "stale_booking_state"; bookingStatus: BookingStatus }
  | { kind: "unknown_gateway_status"; rawStatus: string }
  | {
      kind: "settlement_regression";
      currentStatus: PaymentStatus;
      candidateStatus: PaymentStatus;
    };

export type ReconcileOutcome =
  | "first_settlement"
  | "duplicate_settlement"
  | "payment_failed"
  | "status_updated"
  | "unchanged"
  | "settlement_regression";

export type ReconcileInput = {
  payment: { id: string; status: PaymentStatus; amount: string };
  bookingStatus: BookingStatus;
  verification: GatewayVerificationResult;
};

export type ReconcileResult = {
  paymentStatus: PaymentStatus;
  bookingStatus: BookingStatus;
  events: NotificationEvent[];
  anomalies: ReconcileAnomaly[];
  outcome: ReconcileOutcome;
  /** True when the payment or booking status differs from the input. */
  changed: boolean;
  /** True only on the first transition into `completed`; the caller stamps `paid_at`. */
  markPaid: boolean;
  failureReason: string | null;
};

function detectAmountMismatch(
  recorded: string,
  received: string | null
): ReconcileAnomaly | null {
  const receivedMinor = toMinorUnits(received);
  const recordedMinor = toMinorUnits(recorded);
  if (receivedMinor === null || recordedMinor === null) {
    return null;
  }
  if (receivedMinor === recordedMinor) {
    return null;
  }
  return {
    kind: "amount_mismatch",
    expected: formatMinorUnits(recordedMinor),
    received: formatMinorUnits(receivedMinor),
  };
}

/**
 * Decides the next payment and booking state for a gateway verification.
 *
 * Pure and total: no I/O, and every input yields a result. Problems that need an
 * operator ride along as anomalies; the caller persists the state, records the
 * anomalies and forwards the events.
 */
export function reconcile(input: ReconcileInput): ReconcileResult {
  const { payment, bookingStatus, verification } = input;
  const anomalies: ReconcileAnomaly[] = [];

  const mapping = mapGatewayStatus(verification.rawStatus);
  if (!mapping.recognized) {
    anomalies.push({ kind: "unknown_gateway_status", rawStatus: verification.rawStatus });
  }

  const mismatch = detectAmountMismatch(payment.amount, verification.amount);
  if (mismatch) {
    anomalies.push(mismatch);
  }

  const candidate = mapping.status;
  const keep = (outcome: ReconcileOutcome): ReconcileResult => ({
    paymentStatus: payment.status,
    bookingStatus,
    events: [],
    anomalies,
    outcome,
    changed: false,
    markPaid: false,
    failureReason: null,
  });

  if (payment.status === "completed" && candidate === "completed") {
    return keep("duplicate_settlement");
  }

  // A completed payment never leaves completed through reconciliation.
  if (payment.status === "completed") {
    anomalies.push({
      kind: "settlement_regression",
      currentStatus: payment.status,
      candidateStatus: candidate,
    });
    return keep("settlement_regression");
  }

  if (candidate === "completed") {
    const events: NotificationEvent[] = [{ type: "payment_confirmed", paymentId: payment.id }];
    let nextBookingStatus: BookingStatus = "confirmed";
    if (bookingStatus === "cancelled") {
      anomalies.push({ kind: "stale_booking_state", bookingStatus });
      nextBookingStatus = bookingStatus;
    }
    return {
      paymentStatus: "completed",
      bookingStatus: nextBookingStatus,
      events,
      anomalies,
      outcome: "first_settlement",
      changed: true,
      markPaid: true,
      failureReason: null,
    };
  }

  if (candidate === "failed" && payment.status !== "failed") {
    const reason = verification.failureReason?.trim() || DEFAULT_FAILURE_REASON;
    return {
      paymentStatus: "failed",
      bookingStatus,
      events: [{ type: "payment_failed", paymentId: payment.id, reason }],
      anomalies,
      outcome: "payment_failed",
      changed: true,
      markPaid: false,
      failureReason: reason,
    };
  }

  if (candidate === payment.status) {
    return keep("unchanged");
  }

  return {
    paymentStatus: candidate,
    bookingStatus,
    events: [],
    anomalies,
    outcome: "status_updated",
    changed: true,
    markPaid: false,
    failureReason: null,
  };
}
