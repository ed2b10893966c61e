import { IncomingHttpHeaders } from "http";

export type CorsAction = "forward-unmodified" | "forward-with-headers" | "respond-preflight-ok" | "reject";

export type CorsRejectReason = "origin-mismatch" | "method-not-allowed" | "headers-not-allowed";

export interface CorsRequest {
  method: string;
  headers: IncomingHttpHeaders;
}

export interface CorsDecision {
  action: CorsAction;
  /** Response headers to write, in emission order. Always holds `Vary`. */
  headers: Record<string, string>;
  origin?: string;
  preflight: boolean;
  reason?: CorsRejectReason;
}
