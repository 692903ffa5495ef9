import type { AxiosRequestConfig } from "axios";

import { AppError } from "../../../core/errors";
import type { GatewayVerificationResult } from "../payment-status";

export type GatewayErrorKind =
  | "unauthorized"
  | "invalid_request"
  | "unreachable"
  | "malformed_response";

const STATUS_BY_KIND: Record<GatewayErrorKind, number> = {
  unauthorized: 502,
  invalid_request: 400,
  unreachable: 503,
  malformed_response: 502,
};

export class GatewayError extends AppError {
  readonly retryable: boolean;

  constructor(
    public readonly kind: GatewayErrorKind,
    message: string,
    details?: unknown
  ) {
    super(STATUS_BY_KIND[kind], message, `gateway_${kind}`, details);
    this.name = "GatewayError";
    this.retryable = kind === "unreachable";
  }
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

export type PaymentInitiationRequest = {
  transactionReference: string;
  amount: string;
  currency: string;
  email: string;
  firstName: string;
  lastName: string;
  phoneNumber?: string;
  callbackUrl: string;
  returnUrl: string;
  customization?: {
    title: string;
    description: string;
  };
  meta?: Record<string, string>;
};

export type PaymentInitiationResult = {
  checkoutUrl: string;
  transactionReference: string;
  raw: unknown;
};

export interface PaymentGateway {
  readonly provider: string;
  initiate(request: PaymentInitiationRequest): Promise<PaymentInitiationResult>;
  verify(transactionReference: string): Promise<GatewayVerificationResult>;
}

export type GatewayHttpResponse = {
  status: number;
  data: unknown;
};

// The slice of an axios instance the gateways call.
export interface GatewayHttpClient {
  get(url: string, config?: AxiosRequestConfig): Promise<GatewayHttpResponse>;
  post(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<GatewayHttpResponse>;
}
