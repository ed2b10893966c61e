import { Inject, Injectable, Optional } from "@nestjs/common";
import { IncomingHttpHeaders } from "http";
import { AppLoggingService } from "../../logging/services/logging.service";
import {
  ALLOW_CREDENTIALS_HEADER,
  ALLOW_HEADERS_HEADER,
  ALLOW_METHODS_HEADER,
  ALLOW_ORIGIN_HEADER,
  CORS_POLICY,
  EXPOSE_HEADERS_HEADER,
  MAX_AGE_HEADER,
  OPTIONS_METHOD,
  ORIGIN_HEADER,
  REQUEST_HEADERS_HEADER,
  REQUEST_METHOD_HEADER,
  VARY_HEADER,
  WILDCARD_ORIGIN,
} from "../constants/cors.constants";
import { CorsDecision, CorsRejectReason, CorsRequest } from "../interfaces/cors.decision.interface";
import type { CorsPolicy } from "../interfaces/cors.policy.interface";

function readHeader(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

@Injectable()
export class CorsService {
  constructor(
    @Inject(CORS_POLICY) private readonly policy: CorsPolicy,
    @Optional() private readonly logger?: AppLoggingService,
  ) {}

  /**
   * Decides how a request is handled and which headers go on its response.
   * Only reads the policy, so it is safe to call for concurrent requests.
   */
  evaluate(request: CorsRequest): CorsDecision {
    const headers: Record<string, string> = { [VARY_HEADER]: ORIGIN_HEADER };

    const origin = readHeader(request.headers, ORIGIN_HEADER);
    if (!origin) {
      return { action: "forward-unmodified", headers, preflight: false };
    }

    if (!this.matchOrigin(origin)) {
      return this.reject(request, origin, false, "origin-mismatch");
    }

    const requestedMethod =
      request.method === OPTIONS_METHOD ? readHeader(request.headers, REQUEST_METHOD_HEADER) : undefined;
    const preflight = !!requestedMethod;

    if (requestedMethod) {
      const failure = this.validatePreflight(requestedMethod, readHeader(request.headers, REQUEST_HEADERS_HEADER));
      if (failure) {
        return this.reject(request, origin, true, failure);
      }

      headers[ALLOW_METHODS_HEADER] = this.policy.rawMethods;
      headers[ALLOW_HEADERS_HEADER] = this.policy.rawRequestHeaders;
      if (this.policy.maxAge !== "0") {
        headers[MAX_AGE_HEADER] = this.policy.maxAge;
      }
    } else if (this.policy.exposedHeaders !== "") {
      headers[EXPOSE_HEADERS_HEADER] = this.policy.exposedHeaders;
    }

    if (this.policy.credentials) {
      headers[ALLOW_CREDENTIALS_HEADER] = this.policy.renderedCredentials;
      // "*" is not accepted by browsers on credentialed responses
      headers[ALLOW_ORIGIN_HEADER] = origin;
    } else if (this.policy.forceOriginMatch) {
      headers[ALLOW_ORIGIN_HEADER] = WILDCARD_ORIGIN;
    } else {
      headers[ALLOW_ORIGIN_HEADER] = origin;
    }

    return {
      action: preflight ? "respond-preflight-ok" : "forward-with-headers",
      headers,
      origin,
      preflight,
    };
  }

  /**
   * Case-sensitive match against the configured origins.
   */
  matchOrigin(origin: string): boolean {
    return this.policy.forceOriginMatch || this.policy.origins.includes(origin);
  }

  /**
   * Case-sensitive match of the requested method.
   */
  isMethodAllowed(method: string): boolean {
    return method !== "" && this.policy.methods.includes(method);
  }

  /**
   * Case-insensitive match of every requested header. An empty list passes.
   */
  areHeadersAllowed(requestedHeaders: string | undefined): boolean {
    if (!requestedHeaders) return true;

    return requestedHeaders
      .split(",")
      .map((header) => header.trim().toLowerCase())
      .filter((header) => header !== "")
      .every((header) => this.policy.requestHeaders.includes(header));
  }

  private validatePreflight(method: string, requestedHeaders: string | undefined): CorsRejectReason | undefined {
    if (!this.policy.validateHeaders) return undefined;

    if (!this.isMethodAllowed(method)) return "method-not-allowed";
    if (!this.areHeadersAllowed(requestedHeaders)) return "headers-not-allowed";

    return undefined;
  }

  private reject(request: CorsRequest, origin: string, preflight: boolean, reason: CorsRejectReason): CorsDecision {
    if (this.policy.logViolations) {
      this.logger?.logSecurityEvent("CORS request rejected", {
        origin,
        method: request.method,
        preflight,
        reason,
      });
    }

    return {
      action: "reject",
      headers: { [VARY_HEADER]: ORIGIN_HEADER },
      origin,
      preflight,
      reason,
    };
  }

  /**
   * Reports settings that are accepted but probably unintended.
   */
  validateConfiguration(): void {
    const { origins, forceOriginMatch, credentials } = this.policy;

    for (const origin of origins) {
      if (!this.isValidOrigin(origin)) {
        this.logger?.warn(`CORS: Invalid origin configured: ${origin}`, CorsService.name);
      }
    }

    if (forceOriginMatch && credentials) {
      this.logger?.warn(
        "CORS: Wildcard origins with credentials enabled, the request origin is echoed instead of *",
        CorsService.name,
      );
    }

    this.logger?.log(
      `CORS: ${forceOriginMatch ? "all origins" : `${origins.length} origin(s)`} allowed, header validation ${
        this.policy.validateHeaders ? "on" : "off"
      }`,
      CorsService.name,
    );
  }

  private isValidOrigin(origin: string): boolean {
    try {
      new URL(origin);
      return true;
    } catch {
      return false;
    }
  }

  getOrigins(): readonly string[] {
    return this.policy.origins;
  }

  getCredentialsPolicy(): boolean {
    return this.policy.credentials;
  }

  getPolicy(): CorsPolicy {
    return this.policy;
  }
}
