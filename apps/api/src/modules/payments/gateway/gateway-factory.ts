import axios from "axios";

import { ENV } from "../../../config/env";

import { ChapaGateway } from "./chapa-gateway";
import { DummyGateway } from "./dummy-gateway";
import type { PaymentGateway } from "./payment-gateway";

let dummyGateway: DummyGateway | null = null;

export function getPaymentGateway(): PaymentGateway {
  switch (ENV.PAYMENT_PROVIDER) {
    case "chapa": {
      if (!ENV.CHAPA_SECRET_KEY) {
        throw new Error("CHAPA_SECRET_KEY is required when PAYMENT_PROVIDER=chapa");
      }
      return new ChapaGateway(
        {
          secretKey: ENV.CHAPA_SECRET_KEY,
          baseUrl: ENV.CHAPA_BASE_URL,
          timeoutMs: ENV.CHAPA_TIMEOUT_MS,
        },
        axios.create({ timeout: ENV.CHAPA_TIMEOUT_MS })
      );
    }
    case "dummy":
    default:
      // One instance per process so verify sees the references initiate stored.
      dummyGateway ??= new DummyGateway({
        publicBaseUrl: ENV.PUBLIC_BASE_URL,
        outcome: ENV.DUMMY_GATEWAY_OUTCOME,
      });
      return dummyGateway;
  }
}
