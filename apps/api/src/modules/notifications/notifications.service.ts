import { ENV } from "../../config/env";
import { logger } from "../../core/logger";
import type { NotificationEvent } from "../payments/payment-status";
import { DEFAULT_FAILURE_REASON } from "../payments/reconciler";

import type { Notifier } from "./notifier";
import type {
  BookingNotificationContext,
  NotificationStore,
} from "./notifications.repository";
import type { NotificationInsert, NotificationRow } from "./notifications.schema";

export type NotificationListQuery = {
  unreadOnly?: boolean;
  limit?: number;
  offset?: number;
};

export type NotificationRetryOptions = {
  maxAttempts: number;
  baseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
};

function describeStay(context: BookingNotificationContext): string {
  return `${context.listingTitle} (${context.listingLocation}), ${context.checkInDate} to ${context.checkOutDate}`;
}

export class NotificationsService implements Notifier {
  constructor(
    private readonly repository: NotificationStore,
    private readonly retry: NotificationRetryOptions = {
      maxAttempts: ENV.NOTIFY_MAX_ATTEMPTS,
      baseDelayMs: ENV.NOTIFY_RETRY_BASE_DELAY_MS,
    }
  ) {}

  async listNotifications(userId: string, query: NotificationListQuery) {
    const limit = Math.min(Math.max(query.limit ?? 50, 1), 200);
    const offset = Math.max(query.offset ?? 0, 0);

    const items = await this.repository.listNotifications({
      userId,
      unreadOnly: query.unreadOnly,
      limit,
      offset,
    });

    const nextOffset = items.length === limit ? offset + limit : null;
    return { items, nextOffset };
  }

  async markRead(userId: string, ids: string[]) {
    return this.repository.markRead(userId, ids);
  }

  /**
   * Stores an in-app notification for the event. Repeats of the same event hit the
   * dedupe key and store nothing. Rejects once every attempt has failed.
   */
  async dispatch(event: NotificationEvent): Promise<void> {
    const notification = await this.render(event);
    const stored = await this.insertWithRetry(notification);

    logger.info("[Notifications] Event dispatched", {
      module: "notifications",
      type: event.type,
      dedupeKey: notification.dedupeKey,
      duplicate: stored === null,
    });
  }

  private async render(event: NotificationEvent): Promise<NotificationInsert> {
    switch (event.type) {
      case "booking_awaiting_payment": {
        const context = await this.repository.findBookingContext(event.bookingId);
        if (!context) {
          throw new Error(`booking_not_found: ${event.bookingId}`);
        }
        return {
          userId: context.userId,
          type: event.type,
          bookingId: context.bookingId,
          title: `Booking received - #${context.bookingId.slice(0, 8)}`,
          message: `Hi ${context.recipientName}, your booking for ${describeStay(context)} for ${context.numGuests} guest(s) is awaiting payment of ${context.totalPrice}. Please complete your payment to confirm your reservation.`,
          dedupeKey: `${event.type}:${event.bookingId}`,
          metadata: { totalPrice: context.totalPrice },
        };
      }
      case "payment_confirmed": {
        const context = await this.repository.findPaymentContext(event.paymentId);
        if (!context) {
          throw new Error(`payment_not_found: ${event.paymentId}`);
        }
        return {
          userId: context.userId,
          type: event.type,
          bookingId: context.bookingId,
          paymentId: context.paymentId,
          title: `Payment confirmed - Booking #${context.bookingId.slice(0, 8)}`,
          message: `Hi ${context.recipientName}, we received your payment of ${context.amount} ${context.currency}. Your stay at ${describeStay(context)} is confirmed.`,
          dedupeKey: `${event.type}:${event.paymentId}`,
          metadata: { amount: context.amount, currency: context.currency },
        };
      }
      case "payment_failed": {
        const context = await this.repository.findPaymentContext(event.paymentId);
        if (!context) {
          throw new Error(`payment_not_found: ${event.paymentId}`);
        }
        const reason = event.reason || context.failureReason || DEFAULT_FAILURE_REASON;
        return {
          userId: context.userId,
          type: event.type,
          bookingId: context.bookingId,
          paymentId: context.paymentId,
          title: `Payment failed - Booking #${context.bookingId.slice(0, 8)}`,
          message: `Hi ${context.recipientName}, your payment of ${context.amount} ${context.currency} for ${describeStay(context)} was not successful. Reason: ${reason}. You can try again.`,
          dedupeKey: `${event.type}:${event.paymentId}`,
          metadata: { amount: context.amount, currency: context.currency, reason },
        };
      }
    }
  }

  private async insertWithRetry(notification: NotificationInsert): Promise<NotificationRow | null> {
    const wait = this.retry.sleep ?? ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)));

    for (let attempt = 1; ; attempt += 1) {
      try {
        return await this.repository.insertNotification(notification);
      } catch (error) {
        if (attempt >= this.retry.maxAttempts) {
          throw error;
        }
        const delayMs = this.retry.baseDelayMs * attempt;
        logger.warn("[Notifications] Insert failed, retrying", {
          module: "notifications",
          dedupeKey: notification.dedupeKey,
          attempt,
          delayMs,
          error: error instanceof Error ? error.message : String(error),
        });
        await wait(delayMs);
      }
    }
  }
}
