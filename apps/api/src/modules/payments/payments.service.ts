import { createHmac, randomBytes, timingSafeEqual } from "crypto";

import {
  ChapaWebhookPayloadSchema,
  type PaymentInitiateInput,
  type PaymentsQuery,
} from "@tripnest/shared-schema";

import { ENV } from "../../config/env";
import { AppError, badRequest, conflict, isUniqueViolation, notFound } from "../../core/errors";
import { logger } from "../../core/logger";
import { incrementCounter, recordTimer } from "../../core/metrics";
import { toMinorUnits } from "../../core/money";
import { dispatchEvents, type Notifier } from "../notifications/notifier";
import type { Actor } from "../users/users.schema";

import { withGatewayRetry } from "./gateway/retry";
import type { PaymentGateway } from "./gateway/payment-gateway";
import type { BookingStatus } from "./payment-status";
import type { PaymentLedger, PaymentTrigger } from "./payments.repository";
import type { PaymentRecord } from "./payments.schema";
import { reconcile, type ReconcileAnomaly, type ReconcileOutcome } from "./reconciler";

export type PayableBooking = {
  id: string;
  userId: string;
  listingId: string;
  listingTitle: string;
  status: BookingStatus;
  totalPrice: string;
  guest: {
    email: string;
    username: string;
    firstName: string;
    lastName: string;
    phoneNumber: string | null;
  };
};

export interface PayableBookingSource {
  findPayableBooking(bookingId: string): Promise<PayableBooking | null>;
}

export type PaymentsServiceOptions = {
  publicBaseUrl: string;
  returnUrl: string;
  defaultCurrency: string;
  webhookSecret?: string;
  gatewayRetry: {
    maxAttempts: number;
    baseDelayMs: number;
    sleep?: (ms: number) => Promise<void>;
  };
};

export type PaymentDto = {
  id: string;
  bookingId: string;
  userId: string;
  amount: string;
  currency: string;
  method: PaymentRecord["method"];
  status: PaymentRecord["status"];
  txRef: string | null;
  checkoutUrl: string | null;
  gatewayTransactionId: string | null;
  gatewayReference: string | null;
  failureReason: string | null;
  isSuccessful: boolean;
  isPending: boolean;
  paidAt: string | null;
  createdAt: string;
  updatedAt: string;
};

export type PaymentStatusDto = Pick<
  PaymentDto,
  "id" | "status" | "txRef" | "gatewayTransactionId" | "gatewayReference" | "failureReason" | "paidAt" | "isSuccessful"
>;

export type SettlementResult = {
  payment: PaymentDto;
  outcome: ReconcileOutcome;
  anomalies: ReconcileAnomaly[];
};

const defaultOptions = (): PaymentsServiceOptions => ({
  publicBaseUrl: ENV.PUBLIC_BASE_URL,
  returnUrl: ENV.PAYMENT_RETURN_URL,
  defaultCurrency: ENV.DEFAULT_CURRENCY,
  webhookSecret: ENV.CHAPA_WEBHOOK_SECRET,
  gatewayRetry: {
    maxAttempts: ENV.GATEWAY_MAX_ATTEMPTS,
    baseDelayMs: ENV.GATEWAY_RETRY_BASE_DELAY_MS,
  },
});

export function generateTransactionReference(bookingId: string): string {
  const suffix = randomBytes(4).toString("hex").toUpperCase();
  return `TRN-${bookingId.slice(0, 8)}-${suffix}`;
}

export function signWebhookPayload(rawBody: string, secret: string): string {
  return createHmac("sha256", secret).update(rawBody).digest("hex");
}

export type WebhookDelivery = {
  signature?: string;
  /** Body exactly as received; the signature covers these bytes. */
  rawBody?: string;
};

export class PaymentsService {
  private readonly options: PaymentsServiceOptions;

  constructor(
    private readonly ledger: PaymentLedger,
    private readonly bookings: PayableBookingSource,
    private readonly gateway: PaymentGateway,
    private readonly notifier: Notifier,
    options?: PaymentsServiceOptions
  ) {
    this.options = options ?? defaultOptions();
  }

  async initiatePayment(
    actor: Actor,
    input: PaymentInitiateInput
  ): Promise<{ payment: PaymentDto; checkoutUrl: string }> {
    const booking = await this.bookings.findPayableBooking(input.bookingId);
    if (!booking || booking.userId !== actor.userId) {
      throw notFound("booking_not_found");
    }
    if (booking.status !== "pending") {
      throw conflict("booking_not_payable");
    }
    if (input.method !== "chapa") {
      throw badRequest("unsupported_payment_method");
    }

    const existing = await this.ledger.findByBookingId(booking.id);
    if (existing) {
      throw conflict("payment_already_exists");
    }

    if (
      input.amount !== undefined &&
      toMinorUnits(input.amount) !== toMinorUnits(booking.totalPrice)
    ) {
      throw badRequest("amount_mismatch", {
        expected: booking.totalPrice,
        received: input.amount,
      });
    }

    const currency = input.currency ?? this.options.defaultCurrency;
    const transactionReference = generateTransactionReference(booking.id);

    const initiation = await withGatewayRetry(
      () =>
        this.gateway.initiate({
          transactionReference,
          amount: booking.totalPrice,
          currency,
          email: booking.guest.email,
          firstName: booking.guest.firstName || booking.guest.username,
          lastName: booking.guest.lastName || booking.guest.username,
          phoneNumber: booking.guest.phoneNumber ?? undefined,
          callbackUrl: `${this.options.publicBaseUrl}/payments/webhook`,
          returnUrl: this.options.returnUrl,
          customization: {
            title: "TripNest",
            description: `Booking ${booking.id.slice(0, 8)} - ${booking.listingTitle}`.slice(0, 50),
          },
          meta: {
            booking_id: booking.id,
            user_id: booking.userId,
            listing_id: booking.listingId,
          },
        }),
      { ...this.options.gatewayRetry, operation: "initiate" }
    );

    let payment: PaymentRecord;
    try {
      payment = await this.ledger.create({
        bookingId: booking.id,
        userId: booking.userId,
        amount: booking.totalPrice,
        currency,
        method: input.method,
        status: "processing",
        txRef: initiation.transactionReference,
        checkoutUrl: initiation.checkoutUrl,
        gatewayResponse: initiation.raw,
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw conflict("payment_already_exists");
      }
      throw error;
    }

    incrementCounter("payment_initiated_total");
    logger.info("[Payments] Payment initiated", {
      module: "payments",
      paymentId: payment.id,
      bookingId: booking.id,
      provider: this.gateway.provider,
    });

    await dispatchEvents(
      this.notifier,
      [{ type: "booking_awaiting_payment", bookingId: booking.id }],
      "payments"
    );

    return { payment: this.toDto(payment), checkoutUrl: initiation.checkoutUrl };
  }

  async verifyPayment(actor: Actor, paymentId: string): Promise<SettlementResult> {
    const payment = await this.getOwnedPayment(actor, paymentId);
    return this.settle(payment, "manual");
  }

  async handleWebhook(
    payload: unknown,
    delivery: WebhookDelivery = {}
  ): Promise<SettlementResult> {
    this.assertWebhookSignature(delivery.rawBody ?? JSON.stringify(payload), delivery.signature);

    const parsed = ChapaWebhookPayloadSchema.safeParse(payload);
    const txRef = parsed.success ? parsed.data.tx_ref ?? parsed.data.trx_ref : undefined;
    if (!txRef) {
      logger.warn("[Payments] Webhook received without tx_ref", { module: "payments" });
      throw badRequest("transaction_reference_missing");
    }

    const payment = await this.ledger.findByTxRef(txRef);
    if (!payment) {
      logger.warn("[Payments] Webhook for unknown tx_ref", { module: "payments", txRef });
      throw notFound("payment_not_found");
    }

    logger.info("[Payments] Webhook received", {
      module: "payments",
      paymentId: payment.id,
      txRef,
      reportedStatus: parsed.success ? parsed.data.status ?? null : null,
    });

    return this.settle(payment, "webhook");
  }

  async getPaymentStatus(actor: Actor, paymentId: string): Promise<PaymentStatusDto> {
    const payment = this.toDto(await this.getOwnedPayment(actor, paymentId, false));
    return {
      id: payment.id,
      status: payment.status,
      txRef: payment.txRef,
      gatewayTransactionId: payment.gatewayTransactionId,
      gatewayReference: payment.gatewayReference,
      failureReason: payment.failureReason,
      paidAt: payment.paidAt,
      isSuccessful: payment.isSuccessful,
    };
  }

  async getPayment(actor: Actor, paymentId: string): Promise<PaymentDto> {
    return this.toDto(await this.getOwnedPayment(actor, paymentId, false));
  }

  async listPayments(actor: Actor, query: PaymentsQuery): Promise<PaymentDto[]> {
    const records = await this.ledger.list({
      userId: actor.userId,
      status: query.status,
      method: query.method,
      bookingId: query.bookingId,
    });
    return records.map((record) => this.toDto(record));
  }

  /**
   * Verify with the gateway, then read-decide-write under the payment lock.
   * The gateway call happens before the lock is taken; a gateway error leaves
   * every record untouched. Events go out only after the transaction commits.
   */
  private async settle(payment: PaymentRecord, trigger: PaymentTrigger): Promise<SettlementResult> {
    const txRef = payment.txRef;
    if (!txRef) {
      throw badRequest("transaction_reference_missing");
    }

    const startedAt = Date.now();
    const verification = await withGatewayRetry(() => this.gateway.verify(txRef), {
      ...this.options.gatewayRetry,
      operation: "verify",
    });

    const { record, decision } = await this.ledger.withPaymentLock(
      payment.id,
      async (state, writer) => {
        const decision = reconcile({
          payment: {
            id: state.payment.id,
            status: state.payment.status,
            amount: state.payment.amount,
          },
          bookingStatus: state.bookingStatus,
          verification,
        });

        let record = state.payment;
        if (decision.changed) {
          record = await writer.updatePayment({
            status: decision.paymentStatus,
            paidAt: decision.markPaid ? new Date() : undefined,
            gatewayTransactionId:
              verification.gatewayTransactionId ?? state.payment.gatewayTransactionId,
            gatewayReference: verification.gatewayReference ?? state.payment.gatewayReference,
            failureReason: decision.failureReason,
            gatewayResponse: verification.raw,
          });
          if (decision.bookingStatus !== state.bookingStatus) {
            await writer.updateBookingStatus(decision.bookingStatus);
          }
        }
        await writer.recordAnomalies(decision.anomalies, trigger);

        return { record, decision };
      }
    );

    recordTimer("payment_settle_ms", Date.now() - startedAt);
    this.reportSettlement(record, trigger, decision.outcome, decision.anomalies);
    await dispatchEvents(this.notifier, decision.events, "payments");

    return {
      payment: this.toDto(record),
      outcome: decision.outcome,
      anomalies: decision.anomalies,
    };
  }

  private reportSettlement(
    payment: PaymentRecord,
    trigger: PaymentTrigger,
    outcome: ReconcileOutcome,
    anomalies: ReconcileAnomaly[]
  ): void {
    if (outcome === "duplicate_settlement") {
      incrementCounter("payment_duplicate_settlement_total");
      logger.info("[Payments] Duplicate settlement ignored", {
        module: "payments",
        paymentId: payment.id,
        trigger,
      });
    } else if (outcome !== "unchanged" && outcome !== "settlement_regression") {
      incrementCounter("payment_reconciled_total");
      logger.info("[Payments] Payment reconciled", {
        module: "payments",
        paymentId: payment.id,
        trigger,
        outcome,
        status: payment.status,
      });
    }

    for (const anomaly of anomalies) {
      incrementCounter("payment_anomaly_total");
      logger.warn(`[Payments] Reconciliation anomaly: ${anomaly.kind}`, {
        module: "payments",
        paymentId: payment.id,
        trigger,
        anomaly,
      });
    }
  }

  private async getOwnedPayment(
    actor: Actor,
    paymentId: string,
    requireTxRef = true
  ): Promise<PaymentRecord> {
    const payment = await this.ledger.findById(paymentId);
    if (!payment || (actor.role !== "admin" && payment.userId !== actor.userId)) {
      throw notFound("payment_not_found");
    }
    if (requireTxRef && !payment.txRef) {
      throw badRequest("transaction_reference_missing");
    }
    return payment;
  }

  private assertWebhookSignature(rawBody: string, signature: string | undefined): void {
    const secret = this.options.webhookSecret;
    if (!secret) return;

    const expected = Buffer.from(signWebhookPayload(rawBody, secret), "utf8");
    const received = Buffer.from(signature ?? "", "utf8");
    if (expected.length !== received.length || !timingSafeEqual(expected, received)) {
      logger.warn("[Payments] Webhook signature rejected", { module: "payments" });
      throw new AppError(401, "invalid_signature", "invalid_signature");
    }
  }

  private toDto(payment: PaymentRecord): PaymentDto {
    return {
      id: payment.id,
      bookingId: payment.bookingId,
      userId: payment.userId,
      amount: payment.amount,
      currency: payment.currency,
      method: payment.method,
      status: payment.status,
      txRef: payment.txRef,
      checkoutUrl: payment.checkoutUrl,
      gatewayTransactionId: payment.gatewayTransactionId,
      gatewayReference: payment.gatewayReference,
      failureReason: payment.failureReason,
      isSuccessful: payment.status === "completed",
      isPending: payment.status === "pending" || payment.status === "processing",
      paidAt: payment.paidAt?.toISOString() ?? null,
      createdAt: payment.createdAt.toISOString(),
      updatedAt: payment.updatedAt.toISOString(),
    };
  }
}
