import { Inject, Injectable } from "@nestjs/common";
import { FastifyReply, FastifyRequest } from "fastify";
import { CORS_REJECT_HANDLER, VARY_HEADER } from "../constants/cors.constants";
import { CorsDecision } from "../interfaces/cors.decision.interface";
import { CorsRejectHandler } from "../interfaces/cors.module.options.interface";
import { CorsService } from "../services/cors.service";

/**
 * Adds `field` to the Vary header, keeping whatever is already there.
 */
export function appendVary(reply: FastifyReply, field: string): void {
  const current = reply.getHeader(VARY_HEADER);

  if (current === undefined) {
    reply.header(VARY_HEADER, field);
    return;
  }

  const value = Array.isArray(current) ? current.join(", ") : String(current);
  const fields = value.split(",").map((entry) => entry.trim().toLowerCase());
  if (fields.includes("*") || fields.includes(field.toLowerCase())) return;

  reply.header(VARY_HEADER, `${value}, ${field}`);
}

/**
 * Fastify `onRequest` hook applying the CORS decision before routing.
 *
 * Forwarded requests continue to their route. Preflight requests are answered
 * here with an empty 200. Rejected requests never reach the route.
 */
@Injectable()
export class CorsHook {
  constructor(
    private readonly corsService: CorsService,
    @Inject(CORS_REJECT_HANDLER) private readonly onReject: CorsRejectHandler | null,
  ) {}

  readonly handle = async (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> => {
    const decision = this.corsService.evaluate({ method: request.method, headers: request.headers });

    for (const [name, value] of Object.entries(decision.headers)) {
      if (name === VARY_HEADER) {
        appendVary(reply, value);
      } else {
        reply.header(name, value);
      }
    }

    switch (decision.action) {
      case "forward-unmodified":
      case "forward-with-headers":
        return undefined;
      case "respond-preflight-ok":
        return reply.code(200).send();
      case "reject":
        return this.reject(request, reply, decision);
    }
  };

  private async reject(request: FastifyRequest, reply: FastifyReply, decision: CorsDecision): Promise<FastifyReply> {
    if (this.onReject) {
      await this.onReject(request, reply, decision);
    }

    if (reply.sent) return reply;

    const { rejectStatus } = this.corsService.getPolicy();
    if (rejectStatus !== undefined) {
      reply.code(rejectStatus);
    }

    return reply.send();
  }
}
