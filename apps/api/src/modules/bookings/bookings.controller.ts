import {
  BookingCreateInputSchema,
  BookingIdParamSchema,
  BookingsQuerySchema,
} from "@tripnest/shared-schema";
import type { FastifyReply, FastifyRequest } from "fastify";

import { requireActor } from "../../core/http/auth-guard";
import { assertWritable } from "../../core/readonly";
import { BookingsService } from "./bookings.service";

export class BookingsController {
  constructor(private readonly bookingsService: BookingsService) {}

  async create(request: FastifyRequest, reply: FastifyReply) {
    assertWritable();
    const actor = requireActor(request);
    const payload = BookingCreateInputSchema.parse(request.body ?? {});
    const booking = await this.bookingsService.createBooking(
      actor,
      payload
    );
    return reply.status(201).send(booking);
  }

  async list(request: FastifyRequest, reply: FastifyReply) {
    const actor = requireActor(request);
    const query = BookingsQuerySchema.parse(request.query ?? {});
    const bookings = await this.bookingsService.listBookings(
      actor,
      query
    );
    return reply.send(bookings);
  }

  async get(request: FastifyRequest, reply: FastifyReply) {
    const actor = requireActor(request);
    const { bookingId } = BookingIdParamSchema.parse(request.params);
    const booking = await this.bookingsService.getBooking(
      actor,
      bookingId
    );
    return reply.send(booking);
  }

  async cancel(request: FastifyRequest, reply: FastifyReply) {
    assertWritable();
    const actor = requireActor(request);
    const { bookingId } = BookingIdParamSchema.parse(request.params);
    const booking = await this.bookingsService.cancelBooking(
      actor,
      bookingId
    );
    return reply.send({ message: "Booking cancelled successfully", booking });
  }
}
