import { describe, expect, it } from "vitest";

import { DummyGateway } from "../src/modules/payments/gateway/dummy-gateway";

const request = {
  transactionReference: "TRN-b0000000-0A1B2C3D",
  amount: "450.00",
  currency: "ETB",
  email: "guest@example.com",
  firstName: "Abebe",
  lastName: "guest",
  callbackUrl: "http://localhost:3001/payments/webhook",
  returnUrl: "http://localhost:3001/payment/success/",
};

describe("DummyGateway", () => {
  it("answers verification with the configured outcome and stored amount", async () => {
    const gateway = new DummyGateway({ publicBaseUrl: "http://localhost:3001", outcome: "success" });

    const initiated = await gateway.initiate(request);
    const verified = await gateway.verify(request.transactionReference);

    expect(initiated.checkoutUrl).toBe("http://localhost:3001/dummy-checkout/TRN-b0000000-0A1B2C3D");
    expect(verified).toMatchObject({
      rawStatus: "success",
      amount: "450.00",
      currency: "ETB",
      failureReason: null,
    });
    expect(verified.gatewayTransactionId).toMatch(/^dummy_[0-9a-f]{24}$/);
  });

  it("gives a failure reason when configured to fail", async () => {
    const gateway = new DummyGateway({ publicBaseUrl: "http://localhost:3001", outcome: "failed" });
    await gateway.initiate(request);

    const verified = await gateway.verify(request.transactionReference);

    expect(verified.failureReason).toBe("Declined by the dummy gateway");
  });

  it("rejects references it never issued", async () => {
    const gateway = new DummyGateway({ publicBaseUrl: "http://localhost:3001", outcome: "success" });

    await expect(gateway.verify("TRN-unknown")).rejects.toMatchObject({ kind: "invalid_request" });
  });
});
