import {
  PaymentIdParamSchema,
  PaymentInitiateInputSchema,
  PaymentsQuerySchema,
} from "@tripnest/shared-schema";
import type { FastifyReply, FastifyRequest } from "fastify";

import { requireActor } from "../../core/http/auth-guard";
import { assertWritable } from "../../core/readonly";
import { PaymentsService } from "./payments.service";

export const WEBHOOK_SIGNATURE_HEADER = "x-chapa-signature";

export class PaymentsController {
  constructor(private readonly paymentsService: PaymentsService) {}

  async initiate(request: FastifyRequest, reply: FastifyReply) {
    assertWritable();
    const actor = requireActor(request);
    const payload = PaymentInitiateInputSchema.parse(request.body ?? {});
    const result = await this.paymentsService.initiatePayment(actor, payload);
    return reply.status(201).send({
      message: "Payment initiated successfully",
      payment: result.payment,
      checkoutUrl: result.checkoutUrl,
    });
  }

  async verify(request: FastifyRequest, reply: FastifyReply) {
    assertWritable();
    const actor = requireActor(request);
    const { paymentId } = PaymentIdParamSchema.parse(request.params);
    const result = await this.paymentsService.verifyPayment(actor, paymentId);
    return reply.send({
      message: "Payment verification completed",
      outcome: result.outcome,
      payment: result.payment,
      anomalies: result.anomalies,
    });
  }

  async status(request: FastifyRequest, reply: FastifyReply) {
    const actor = requireActor(request);
    const { paymentId } = PaymentIdParamSchema.parse(request.params);
    return reply.send(await this.paymentsService.getPaymentStatus(actor, paymentId));
  }

  async get(request: FastifyRequest, reply: FastifyReply) {
    const actor = requireActor(request);
    const { paymentId } = PaymentIdParamSchema.parse(request.params);
    return reply.send(await this.paymentsService.getPayment(actor, paymentId));
  }

  async list(request: FastifyRequest, reply: FastifyReply) {
    const actor = requireActor(request);
    const query = PaymentsQuerySchema.parse(request.query ?? {});
    return reply.send(await this.paymentsService.listPayments(actor, query));
  }

  async webhook(request: FastifyRequest, reply: FastifyReply) {
    assertWritable();
    const header = request.headers[WEBHOOK_SIGNATURE_HEADER];
    const signature = Array.isArray(header) ? header[0] : header;
    const result = await this.paymentsService.handleWebhook(request.body ?? {}, {
      signature,
      rawBody: request.rawBody,
    });
    return reply.send({
      message: "Webhook processed successfully",
      paymentId: result.payment.id,
      status: result.payment.status,
      outcome: result.outcome,
    });
  }
}
