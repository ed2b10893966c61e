import { FastifyReply, FastifyRequest } from "fastify";
import { ConfigCorsInterface } from "../../../config/interfaces/config.cors.interface";
import { CorsDecision } from "./cors.decision.interface";

/**
 * Called for rejected requests instead of the default handling. If the
 * handler does not send a reply, the request is ended with the default one.
 */
export type CorsRejectHandler = (
  request: FastifyRequest,
  reply: FastifyReply,
  decision: CorsDecision,
) => void | Promise<void>;

export interface CorsModuleOptions extends Partial<ConfigCorsInterface> {
  onReject?: CorsRejectHandler;
}
