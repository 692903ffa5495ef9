import { logger } from "../../core/logger";
import { incrementCounter } from "../../core/metrics";
import type { NotificationEvent } from "../payments/payment-status";

/** Outbound channel for payment and booking events. Delivery retry is the implementation's concern. */
export interface Notifier {
  dispatch(event: NotificationEvent): Promise<void>;
}

/**
 * Hands each event to the notifier in order. A failed dispatch is logged and
 * counted, never rethrown: callers invoke this after their state is committed.
 */
export async function dispatchEvents(
  notifier: Notifier,
  events: NotificationEvent[],
  source: string
): Promise<void> {
  for (const event of events) {
    try {
      await notifier.dispatch(event);
    } catch (error) {
      incrementCounter("notification_dispatch_failed_total");
      logger.error("[Notifications] Dispatch failed", {
        module: source,
        event,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
