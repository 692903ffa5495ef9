import { z } from "zod";

const DATE_ONLY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const DECIMAL_PATTERN = /^\d+(\.\d{1,2})?$/;

const DateOnlySchema = z.string().regex(DATE_ONLY_PATTERN, "expected YYYY-MM-DD");

// Decimal amounts travel as strings ("450.00"); numbers are normalised to two places.
export const DecimalAmountSchema = z
  .union([
    z.number().positive().finite(),
    z.string().trim().regex(DECIMAL_PATTERN, "expected a decimal amount"),
  ])
  .transform((value) => (typeof value === "number" ? value.toFixed(2) : value));
export type DecimalAmount = z.infer<typeof DecimalAmountSchema>;

const RatingSchema = z.coerce.number().int().min(1).max(5);

const BooleanQuerySchema = z
  .enum(["true", "false"])
  .transform((value) => value === "true");

// =====================
// LISTINGS
// =====================

export const ListingOrderingSchema = z.enum([
  "price_per_night",
  "-price_per_night",
  "created_at",
  "-created_at",
  "title",
  "-title",
]);
export type ListingOrdering = z.infer<typeof ListingOrderingSchema>;

export const ListingsQuerySchema = z.object({
  location: z.string().trim().min(1).optional(),
  search: z.string().trim().min(1).optional(),
  minPrice: DecimalAmountSchema.optional(),
  maxPrice: DecimalAmountSchema.optional(),
  maxGuests: z.coerce.number().int().min(1).optional(),
  bedrooms: z.coerce.number().int().min(0).optional(),
  bathrooms: z.coerce.number().int().min(0).optional(),
  availability: BooleanQuerySchema.optional(),
  checkIn: DateOnlySchema.optional(),
  checkOut: DateOnlySchema.optional(),
  ordering: ListingOrderingSchema.default("-created_at"),
  limit: z.coerce.number().int().min(1).max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});
export type ListingsQuery = z.infer<typeof ListingsQuerySchema>;

export const ListingCreateInputSchema = z.object({
  title: z.string().trim().min(1).max(200),
  description: z.string().trim().min(1),
  location: z.string().trim().min(1).max(100),
  pricePerNight: DecimalAmountSchema,
  maxGuests: z.number().int().min(1, "Maximum guests must be at least 1").max(50, "Maximum guests cannot exceed 50").default(1),
  bedrooms: z.number().int().min(0).default(1),
  bathrooms: z.number().int().min(0).default(1),
  amenities: z.string().default(""),
  availability: z.boolean().default(true),
});
export type ListingCreateInput = z.infer<typeof ListingCreateInputSchema>;

export const ListingUpdateInputSchema = z.object({
  title: z.string().trim().min(1).max(200).optional(),
  description: z.string().trim().min(1).optional(),
  location: z.string().trim().min(1).max(100).optional(),
  pricePerNight: DecimalAmountSchema.optional(),
  maxGuests: z.number().int().min(1).max(50).optional(),
  bedrooms: z.number().int().min(0).optional(),
  bathrooms: z.number().int().min(0).optional(),
  amenities: z.string().optional(),
  availability: z.boolean().optional(),
});
export type ListingUpdateInput = z.infer<typeof ListingUpdateInputSchema>;

export const ListingIdParamSchema = z.object({
  listingId: z.string().uuid(),
});
export type ListingIdParam = z.infer<typeof ListingIdParamSchema>;

// =====================
// BOOKINGS
// =====================

export const BookingStatusSchema = z.enum(["pending", "confirmed", "cancelled", "completed"]);

export const BookingCreateInputSchema = z.object({
  listingId: z.string().uuid(),
  checkInDate: DateOnlySchema,
  checkOutDate: DateOnlySchema,
  numGuests: z.number().int().min(1).default(1),
  specialRequests: z.string().max(2000).default(""),
});
export type BookingCreateInput = z.infer<typeof BookingCreateInputSchema>;

export const BookingsQuerySchema = z.object({
  status: BookingStatusSchema.optional(),
  listingId: z.string().uuid().optional(),
});
export type BookingsQuery = z.infer<typeof BookingsQuerySchema>;

export const BookingIdParamSchema = z.object({
  bookingId: z.string().uuid(),
});
export type BookingIdParam = z.infer<typeof BookingIdParamSchema>;

// =====================
// REVIEWS
// =====================

export const ReviewCreateInputSchema = z.object({
  listingId: z.string().uuid(),
  bookingId: z.string().uuid().optional(),
  rating: RatingSchema,
  comment: z.string().trim().min(1),
  cleanlinessRating: RatingSchema.optional(),
  accuracyRating: RatingSchema.optional(),
  locationRating: RatingSchema.optional(),
  valueRating: RatingSchema.optional(),
});
export type ReviewCreateInput = z.infer<typeof ReviewCreateInputSchema>;

export const ReviewUpdateInputSchema = ReviewCreateInputSchema.omit({
  listingId: true,
  bookingId: true,
}).partial();
export type ReviewUpdateInput = z.infer<typeof ReviewUpdateInputSchema>;

export const ReviewsQuerySchema = z.object({
  listingId: z.string().uuid().optional(),
  rating: RatingSchema.optional(),
});
export type ReviewsQuery = z.infer<typeof ReviewsQuerySchema>;

export const ReviewIdParamSchema = z.object({
  reviewId: z.string().uuid(),
});
export type ReviewIdParam = z.infer<typeof ReviewIdParamSchema>;

// =====================
// PAYMENTS
// =====================

export const PaymentStatusSchema = z.enum([
  "pending",
  "processing",
  "completed",
  "failed",
  "cancelled",
  "refunded",
]);

export const PaymentMethodSchema = z.enum(["chapa", "bank_transfer", "cash"]);
export type PaymentMethod = z.infer<typeof PaymentMethodSchema>;

export const PaymentInitiateInputSchema = z.object({
  bookingId: z.string().uuid(),
  amount: DecimalAmountSchema.optional(),
  currency: z.string().trim().length(3).toUpperCase().optional(),
  method: PaymentMethodSchema.default("chapa"),
});
export type PaymentInitiateInput = z.infer<typeof PaymentInitiateInputSchema>;

export const PaymentsQuerySchema = z.object({
  status: PaymentStatusSchema.optional(),
  method: PaymentMethodSchema.optional(),
  bookingId: z.string().uuid().optional(),
});
export type PaymentsQuery = z.infer<typeof PaymentsQuerySchema>;

export const PaymentIdParamSchema = z.object({
  paymentId: z.string().uuid(),
});
export type PaymentIdParam = z.infer<typeof PaymentIdParamSchema>;

// Chapa posts more fields than these; only tx_ref is needed to find the payment.
export const ChapaWebhookPayloadSchema = z
  .object({
    tx_ref: z.string().trim().min(1).optional(),
    trx_ref: z.string().trim().min(1).optional(),
    status: z.string().optional(),
    reference: z.string().optional(),
    amount: z.union([z.string(), z.number()]).optional(),
    currency: z.string().optional(),
  })
  .passthrough();
export type ChapaWebhookPayload = z.infer<typeof ChapaWebhookPayloadSchema>;

// =====================
// NOTIFICATIONS
// =====================

export const NotificationsQuerySchema = z.object({
  unread: BooleanQuerySchema.optional(),
  limit: z.coerce.number().int().min(1).max(200).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});
export type NotificationsQuery = z.infer<typeof NotificationsQuerySchema>;

export const NotificationsMarkReadInputSchema = z.object({
  ids: z.array(z.string().uuid()).min(1),
});
export type NotificationsMarkReadInput = z.infer<typeof NotificationsMarkReadInputSchema>;
