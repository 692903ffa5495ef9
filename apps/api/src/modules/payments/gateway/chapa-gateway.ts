import axios from "axios";
import { z } from "zod";

import { logger } from "../../../core/logger";
import type { GatewayVerificationResult } from "../payment-status";

import {
  GatewayError,
  type GatewayHttpClient,
  type GatewayHttpResponse,
  type PaymentGateway,
  type PaymentInitiationRequest,
  type PaymentInitiationResult,
} from "./payment-gateway";

export type ChapaGatewayConfig = {
  secretKey: string;
  baseUrl: string;
  timeoutMs: number;
};

const ChapaEnvelopeSchema = z.object({
  status: z.string(),
  message: z.unknown().optional(),
  data: z.unknown().optional(),
});

const ChapaInitializeDataSchema = z.object({
  checkout_url: z.string().url(),
});

const ChapaVerifyDataSchema = z
  .object({
    status: z.string(),
    amount: z.union([z.string(), z.number()]).nullish(),
    currency: z.string().nullish(),
    id: z.union([z.string(), z.number()]).nullish(),
    reference: z.string().nullish(),
    tx_ref: z.string().nullish(),
    failure_reason: z.string().nullish(),
  })
  .passthrough();

const REQUIRED_INITIATE_FIELDS = [
  "amount",
  "currency",
  "email",
  "first_name",
  "last_name",
  "tx_ref",
] as const;

function describeMessage(message: unknown, fallback: string): string {
  if (typeof message === "string" && message.trim()) {
    return message;
  }
  if (message && typeof message === "object") {
    return JSON.stringify(message);
  }
  return fallback;
}

function dropEmpty(payload: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(payload).filter(
      ([, value]) => value !== undefined && value !== null && value !== ""
    )
  );
}

export class ChapaGateway implements PaymentGateway {
  readonly provider = "chapa";

  constructor(
    private readonly config: ChapaGatewayConfig,
    private readonly httpClient: GatewayHttpClient = axios
  ) {}

  async initiate(request: PaymentInitiationRequest): Promise<PaymentInitiationResult> {
    const body = dropEmpty({
      amount: request.amount,
      currency: request.currency,
      email: request.email,
      first_name: request.firstName,
      last_name: request.lastName,
      phone_number: request.phoneNumber,
      tx_ref: request.transactionReference,
      callback_url: request.callbackUrl,
      return_url: request.returnUrl,
      customization: request.customization,
      meta: request.meta,
    });

    const missing = REQUIRED_INITIATE_FIELDS.find((field) => !(field in body));
    if (missing) {
      throw new GatewayError("invalid_request", `Missing required field: ${missing}`);
    }

    logger.info("[Chapa] Initializing transaction", {
      module: "payments",
      txRef: request.transactionReference,
    });

    const response = await this.send("initialize", () =>
      this.httpClient.post(this.url("/transaction/initialize"), body, this.requestConfig())
    );
    const data = this.unwrap(response, "Payment initialization failed");
    const parsed = ChapaInitializeDataSchema.safeParse(data);
    if (!parsed.success) {
      throw new GatewayError("malformed_response", "Gateway response is missing checkout_url", {
        issues: parsed.error.issues,
      });
    }

    return {
      checkoutUrl: parsed.data.checkout_url,
      transactionReference: request.transactionReference,
      raw: data,
    };
  }

  async verify(transactionReference: string): Promise<GatewayVerificationResult> {
    logger.info("[Chapa] Verifying transaction", {
      module: "payments",
      txRef: transactionReference,
    });

    const response = await this.send("verify", () =>
      this.httpClient.get(
        this.url(`/transaction/verify/${encodeURIComponent(transactionReference)}`),
        this.requestConfig()
      )
    );
    const data = this.unwrap(response, "Payment verification failed");
    const parsed = ChapaVerifyDataSchema.safeParse(data);
    if (!parsed.success) {
      throw new GatewayError("malformed_response", "Gateway verification data is invalid", {
        issues: parsed.error.issues,
      });
    }

    const verified = parsed.data;
    return {
      rawStatus: verified.status,
      amount: verified.amount === null || verified.amount === undefined ? null : String(verified.amount),
      currency: verified.currency ?? null,
      gatewayTransactionId:
        verified.id === null || verified.id === undefined ? null : String(verified.id),
      gatewayReference: verified.reference ?? null,
      failureReason: verified.failure_reason ?? null,
      raw: data,
    };
  }

  private url(path: string): string {
    return `${this.config.baseUrl.replace(/\/$/, "")}${path}`;
  }

  private requestConfig() {
    return {
      headers: {
        Authorization: `Bearer ${this.config.secretKey}`,
        "Content-Type": "application/json",
      },
      timeout: this.config.timeoutMs,
    };
  }

  private async send(
    operation: string,
    call: () => Promise<GatewayHttpResponse>
  ): Promise<GatewayHttpResponse> {
    const startedAt = Date.now();
    try {
      const response = await call();
      logger.debug("[Chapa] Response received", {
        module: "payments",
        operation,
        status: response.status,
        durationMs: Date.now() - startedAt,
      });
      return response;
    } catch (error) {
      const classified = this.classify(error);
      logger.error("[Chapa] Request failed", {
        module: "payments",
        operation,
        kind: classified.kind,
        error: classified.message,
        durationMs: Date.now() - startedAt,
      });
      throw classified;
    }
  }

  private classify(error: unknown): GatewayError {
    if (error instanceof GatewayError) {
      return error;
    }

    if (!axios.isAxiosError(error)) {
      const message = error instanceof Error ? error.message : String(error);
      return new GatewayError("unreachable", `Failed to connect to payment gateway: ${message}`);
    }

    const status = error.response?.status;
    if (status === undefined) {
      return new GatewayError(
        "unreachable",
        `Failed to connect to payment gateway: ${error.message}`,
        { code: error.code ?? null }
      );
    }

    if (status === 401 || status === 403) {
      return new GatewayError("unauthorized", "Payment gateway rejected the credentials", {
        status,
      });
    }

    if (status >= 500) {
      return new GatewayError("unreachable", `Payment gateway unavailable (HTTP ${status})`, {
        status,
      });
    }

    const body = ChapaEnvelopeSchema.partial().safeParse(error.response?.data);
    const message = describeMessage(
      body.success ? body.data.message : undefined,
      "Unknown error occurred"
    );
    return new GatewayError("invalid_request", `Payment gateway error: ${message}`, { status });
  }

  private unwrap(response: GatewayHttpResponse, fallbackMessage: string): unknown {
    const envelope = ChapaEnvelopeSchema.safeParse(response.data);
    if (!envelope.success) {
      throw new GatewayError("malformed_response", "Invalid response from payment gateway");
    }

    if (envelope.data.status !== "success") {
      throw new GatewayError(
        "invalid_request",
        describeMessage(envelope.data.message, fallbackMessage)
      );
    }

    if (envelope.data.data === undefined || envelope.data.data === null) {
      throw new GatewayError("malformed_response", "Gateway response has no data");
    }

    return envelope.data.data;
  }
}
