import { createHash } from "crypto";

import type { GatewayVerificationResult } from "../payment-status";

import {
  GatewayError,
  type PaymentGateway,
  type PaymentInitiationRequest,
  type PaymentInitiationResult,
} from "./payment-gateway";

export type DummyGatewayOutcome = "success" | "pending" | "failed" | "cancelled";

export type DummyGatewayConfig = {
  publicBaseUrl: string;
  outcome: DummyGatewayOutcome;
};

type DummyTransaction = {
  amount: string;
  currency: string;
};

/** Offline gateway for local development; every verification answers with the configured outcome. */
export class DummyGateway implements PaymentGateway {
  readonly provider = "dummy";
  private readonly transactions = new Map<string, DummyTransaction>();

  constructor(private readonly config: DummyGatewayConfig) {}

  async initiate(request: PaymentInitiationRequest): Promise<PaymentInitiationResult> {
    this.transactions.set(request.transactionReference, {
      amount: request.amount,
      currency: request.currency,
    });

    return {
      checkoutUrl: `${this.config.publicBaseUrl}/dummy-checkout/${encodeURIComponent(
        request.transactionReference
      )}`,
      transactionReference: request.transactionReference,
      raw: { provider: this.provider, tx_ref: request.transactionReference },
    };
  }

  async verify(transactionReference: string): Promise<GatewayVerificationResult> {
    const transaction = this.transactions.get(transactionReference);
    if (!transaction) {
      throw new GatewayError("invalid_request", `Unknown transaction reference: ${transactionReference}`);
    }

    const externalId = createHash("sha256")
      .update(transactionReference)
      .digest("hex")
      .slice(0, 24);
    const failed = this.config.outcome === "failed";

    return {
      rawStatus: this.config.outcome,
      amount: transaction.amount,
      currency: transaction.currency,
      gatewayTransactionId: `dummy_${externalId}`,
      gatewayReference: `DUMMY-${externalId.slice(0, 10).toUpperCase()}`,
      failureReason: failed ? "Declined by the dummy gateway" : null,
      raw: { provider: this.provider, tx_ref: transactionReference, status: this.config.outcome },
    };
  }
}
