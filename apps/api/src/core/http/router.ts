import type { FastifyInstance } from "fastify";

import { BookingsController } from "../../modules/bookings/bookings.controller";
import { BookingsRepository, type BookingStore } from "../../modules/bookings/bookings.repository";
import { BookingsService } from "../../modules/bookings/bookings.service";
import { ListingsController } from "../../modules/listings/listings.controller";
import { ListingsRepository, type ListingStore } from "../../modules/listings/listings.repository";
import { ListingsService } from "../../modules/listings/listings.service";
import { NotificationsController } from "../../modules/notifications/notifications.controller";
import {
  NotificationsRepository,
  type NotificationStore,
} from "../../modules/notifications/notifications.repository";
import { NotificationsService } from "../../modules/notifications/notifications.service";
import type { Notifier } from "../../modules/notifications/notifier";
import { getPaymentGateway } from "../../modules/payments/gateway/gateway-factory";
import type { PaymentGateway } from "../../modules/payments/gateway/payment-gateway";
import { PaymentsController } from "../../modules/payments/payments.controller";
import { PaymentsRepository, type PaymentLedger } from "../../modules/payments/payments.repository";
import {
  PaymentsService,
  type PaymentsServiceOptions,
} from "../../modules/payments/payments.service";
import { ReviewsController } from "../../modules/reviews/reviews.controller";
import { ReviewsRepository, type ReviewStore } from "../../modules/reviews/reviews.repository";
import { ReviewsService } from "../../modules/reviews/reviews.service";

import { authGuard } from "./auth-guard";
import { registerInternalRoutes } from "./routes/internal";

const API_VERSION = "1.0.0";

export type RouteDependencies = {
  listingStore: ListingStore;
  bookingStore: BookingStore;
  reviewStore: ReviewStore;
  paymentLedger: PaymentLedger;
  notificationStore: NotificationStore;
  paymentGateway: PaymentGateway;
  /** Replaces the stored-notification dispatcher used by bookings and payments. */
  notifier: Notifier;
  paymentsOptions: PaymentsServiceOptions;
  databaseProbe: () => Promise<void>;
};

export async function registerRoutes(
  app: FastifyInstance,
  dependencies: Partial<RouteDependencies> = {}
): Promise<void> {
  const listingStore = dependencies.listingStore ?? new ListingsRepository();
  const bookingStore = dependencies.bookingStore ?? new BookingsRepository();
  const reviewStore = dependencies.reviewStore ?? new ReviewsRepository();
  const paymentLedger = dependencies.paymentLedger ?? new PaymentsRepository();
  const notificationsService = new NotificationsService(
    dependencies.notificationStore ?? new NotificationsRepository()
  );
  const notifier = dependencies.notifier ?? notificationsService;
  const paymentGateway = dependencies.paymentGateway ?? getPaymentGateway();

  const listingsController = new ListingsController(new ListingsService(listingStore));
  const bookingsController = new BookingsController(new BookingsService(bookingStore, notifier));
  const reviewsController = new ReviewsController(new ReviewsService(reviewStore));
  const paymentsController = new PaymentsController(
    new PaymentsService(
      paymentLedger,
      bookingStore,
      paymentGateway,
      notifier,
      dependencies.paymentsOptions
    )
  );
  const notificationsController = new NotificationsController(notificationsService);

  app.get("/", async () => ({ status: "ok", service: "tripnest-api" }));
  app.get("/welcome", async () => ({
    message: "Welcome to the TripNest API",
    version: API_VERSION,
    endpoints: {
      listings: "/listings",
      bookings: "/bookings",
      reviews: "/reviews",
      payments: "/payments",
      notifications: "/notifications",
      health: "/internal/health",
    },
  }));

  app.get("/listings", (request, reply) => listingsController.list(request, reply));
  app.get("/listings/available", (request, reply) =>
    listingsController.available(request, reply)
  );
  app.get("/listings/:listingId", (request, reply) => listingsController.get(request, reply));
  app.post("/listings", { preHandler: authGuard }, (request, reply) =>
    listingsController.create(request, reply)
  );
  app.patch("/listings/:listingId", { preHandler: authGuard }, (request, reply) =>
    listingsController.update(request, reply)
  );
  app.delete("/listings/:listingId", { preHandler: authGuard }, (request, reply) =>
    listingsController.remove(request, reply)
  );

  app.post("/bookings", { preHandler: authGuard }, (request, reply) =>
    bookingsController.create(request, reply)
  );
  app.get("/bookings", { preHandler: authGuard }, (request, reply) =>
    bookingsController.list(request, reply)
  );
  app.get("/bookings/:bookingId", { preHandler: authGuard }, (request, reply) =>
    bookingsController.get(request, reply)
  );
  app.post("/bookings/:bookingId/cancel", { preHandler: authGuard }, (request, reply) =>
    bookingsController.cancel(request, reply)
  );

  app.get("/reviews", (request, reply) => reviewsController.list(request, reply));
  app.post("/reviews", { preHandler: authGuard }, (request, reply) =>
    reviewsController.create(request, reply)
  );
  app.patch("/reviews/:reviewId", { preHandler: authGuard }, (request, reply) =>
    reviewsController.update(request, reply)
  );
  app.delete("/reviews/:reviewId", { preHandler: authGuard }, (request, reply) =>
    reviewsController.remove(request, reply)
  );

  // Gateway callback: authenticity comes from the signature and re-verification.
  app.post("/payments/webhook", (request, reply) => paymentsController.webhook(request, reply));
  app.post("/payments/initiate", { preHandler: authGuard }, (request, reply) =>
    paymentsController.initiate(request, reply)
  );
  app.get("/payments", { preHandler: authGuard }, (request, reply) =>
    paymentsController.list(request, reply)
  );
  app.get("/payments/:paymentId", { preHandler: authGuard }, (request, reply) =>
    paymentsController.get(request, reply)
  );
  app.get("/payments/:paymentId/status", { preHandler: authGuard }, (request, reply) =>
    paymentsController.status(request, reply)
  );
  app.post("/payments/:paymentId/verify", { preHandler: authGuard }, (request, reply) =>
    paymentsController.verify(request, reply)
  );

  app.get("/notifications", { preHandler: authGuard }, (request, reply) =>
    notificationsController.list(request, reply)
  );
  app.post("/notifications/read", { preHandler: authGuard }, (request, reply) =>
    notificationsController.markRead(request, reply)
  );

  await registerInternalRoutes(app, {
    paymentProvider: paymentGateway.provider,
    checkDatabase: dependencies.databaseProbe,
  });
}
