import {
  NotificationsMarkReadInputSchema,
  NotificationsQuerySchema,
} from "@tripnest/shared-schema";
import type { FastifyReply, FastifyRequest } from "fastify";

import { requireUser } from "../../core/http/auth-guard";
import { NotificationsService } from "./notifications.service";

export class NotificationsController {
  constructor(private readonly notificationsService: NotificationsService) {}

  async list(request: FastifyRequest, reply: FastifyReply) {
    const user = requireUser(request);
    const query = NotificationsQuerySchema.parse(request.query ?? {});

    const result = await this.notificationsService.listNotifications(user.id, {
      unreadOnly: query.unread,
      limit: query.limit,
      offset: query.offset,
    });

    return reply.send(result);
  }

  async markRead(request: FastifyRequest, reply: FastifyReply) {
    const user = requireUser(request);
    const payload = NotificationsMarkReadInputSchema.parse(request.body ?? {});

    const updated = await this.notificationsService.markRead(user.id, payload.ids);
    return reply.send({ updated });
  }
}
