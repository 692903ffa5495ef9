import { beforeEach, describe, expect, it } from "vitest";

import { getCounter, resetMetrics } from "../src/core/metrics";
import { GatewayError } from "../src/modules/payments/gateway/payment-gateway";
import { withGatewayRetry } from "../src/modules/payments/gateway/retry";

function recorder() {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

describe("withGatewayRetry", () => {
  beforeEach(() => {
    resetMetrics();
  });

  it("retries unreachable failures with linear backoff", async () => {
    const { delays, sleep } = recorder();
    let calls = 0;

    const result = await withGatewayRetry(
      async () => {
        calls += 1;
        if (calls < 3) throw new GatewayError("unreachable", "connection reset");
        return "ok";
      },
      { maxAttempts: 3, baseDelayMs: 100, operation: "verify", sleep, random: () => 0 }
    );

    expect(result).toBe("ok");
    expect(calls).toBe(3);
    expect(delays).toEqual([100, 200]);
    expect(getCounter("gateway_retry_total")).toBe(2);
  });

  it("adds jitter below 150ms", async () => {
    const { delays, sleep } = recorder();
    let calls = 0;

    await withGatewayRetry(
      async () => {
        calls += 1;
        if (calls === 1) throw new GatewayError("unreachable", "timeout");
        return "ok";
      },
      { maxAttempts: 2, baseDelayMs: 100, operation: "verify", sleep, random: () => 0.5 }
    );

    expect(delays).toEqual([175]);
  });

  it("rethrows the last unreachable error once attempts run out", async () => {
    const { delays, sleep } = recorder();
    let calls = 0;

    await expect(
      withGatewayRetry(
        async () => {
          calls += 1;
          throw new GatewayError("unreachable", `attempt ${calls}`);
        },
        { maxAttempts: 2, baseDelayMs: 10, operation: "initiate", sleep, random: () => 0 }
      )
    ).rejects.toThrow("attempt 2");

    expect(calls).toBe(2);
    expect(delays).toEqual([10]);
  });

  it("does not retry other gateway failures", async () => {
    const { delays, sleep } = recorder();
    let calls = 0;

    await expect(
      withGatewayRetry(
        async () => {
          calls += 1;
          throw new GatewayError("unauthorized", "bad key");
        },
        { maxAttempts: 5, baseDelayMs: 10, operation: "verify", sleep }
      )
    ).rejects.toMatchObject({ kind: "unauthorized" });

    expect(calls).toBe(1);
    expect(delays).toEqual([]);
    expect(getCounter("gateway_retry_total")).toBe(0);
  });

  it("does not retry errors that are not gateway errors", async () => {
    const { sleep } = recorder();
    let calls = 0;

    await expect(
      withGatewayRetry(
        async () => {
          calls += 1;
          throw new Error("boom");
        },
        { maxAttempts: 3, baseDelayMs: 10, operation: "verify", sleep }
      )
    ).rejects.toThrow("boom");

    expect(calls).toBe(1);
  });
});
