import { vi, describe, it, expect, beforeEach, afterEach } from "vitest";
import { IncomingHttpHeaders } from "http";
import { ConfigCorsInterface } from "../../../config/interfaces/config.cors.interface";
import { AppLoggingService } from "../../logging/services/logging.service";
import { createCorsPolicy } from "../factories/cors.policy.factory";
import { CorsService } from "../services/cors.service";

const baseSettings: ConfigCorsInterface = {
  origins: "http://a.com",
  methods: "GET, POST",
  requestHeaders: "X-Foo, x-bar",
  exposedHeaders: "",
  maxAge: 0,
  credentials: false,
  validateHeaders: true,
  logViolations: false,
};

const createService = (overrides: Partial<ConfigCorsInterface> = {}, logger?: AppLoggingService) =>
  new CorsService(createCorsPolicy({ ...baseSettings, ...overrides }), logger);

const get = (headers: IncomingHttpHeaders = {}) => ({ method: "GET", headers });

const preflight = (requestMethod: string, requestHeaders?: string, origin = "http://a.com") => ({
  method: "OPTIONS",
  headers: {
    origin,
    "access-control-request-method": requestMethod,
    ...(requestHeaders !== undefined && { "access-control-request-headers": requestHeaders }),
  },
});

describe("CorsService", () => {
  describe("requests without an Origin header", () => {
    it("should forward unmodified apart from Vary", () => {
      const decision = createService().evaluate(get());

      expect(decision).toEqual({ action: "forward-unmodified", headers: { Vary: "Origin" }, preflight: false });
    });

    it("should treat an empty Origin as absent", () => {
      const decision = createService().evaluate(get({ origin: "" }));

      expect(decision.action).toBe("forward-unmodified");
      expect(decision.headers).toEqual({ Vary: "Origin" });
    });
  });

  describe("origin matching", () => {
    it("should reject an origin outside the allowed set", () => {
      const decision = createService().evaluate(get({ origin: "http://evil.com" }));

      expect(decision).toEqual({
        action: "reject",
        headers: { Vary: "Origin" },
        origin: "http://evil.com",
        preflight: false,
        reason: "origin-mismatch",
      });
    });

    it("should match origins case-sensitively", () => {
      expect(createService().evaluate(get({ origin: "HTTP://A.COM" })).action).toBe("reject");
    });

    it("should match any origin under the wildcard policy", () => {
      const decision = createService({ origins: "*" }).evaluate(get({ origin: "http://anything.example" }));

      expect(decision.action).toBe("forward-with-headers");
      expect(decision.headers).toEqual({ Vary: "Origin", "Access-Control-Allow-Origin": "*" });
    });

    it("should echo the matched origin", () => {
      const decision = createService({ origins: "http://a.com, http://b.com" }).evaluate(get({ origin: "http://b.com" }));

      expect(decision.headers["Access-Control-Allow-Origin"]).toBe("http://b.com");
    });
  });

  describe("credentials", () => {
    it("should echo the origin and allow credentials", () => {
      const service = createService({ origins: "http://a.com", methods: "GET, POST", credentials: true });

      const decision = service.evaluate(get({ origin: "http://a.com" }));

      expect(decision.action).toBe("forward-with-headers");
      expect(decision.headers).toEqual({
        Vary: "Origin",
        "Access-Control-Allow-Credentials": "true",
        "Access-Control-Allow-Origin": "http://a.com",
      });
    });

    it("should never send the wildcard with credentials", () => {
      const decision = createService({ origins: "*", credentials: true }).evaluate(get({ origin: "http://x.test" }));

      expect(decision.headers["Access-Control-Allow-Origin"]).toBe("http://x.test");
      expect(decision.headers["Access-Control-Allow-Credentials"]).toBe("true");
    });

    it("should not send the credentials header when disabled", () => {
      const decision = createService().evaluate(get({ origin: "http://a.com" }));

      expect(decision.headers).not.toHaveProperty("Access-Control-Allow-Credentials");
    });
  });

  describe("simple requests", () => {
    it("should expose configured headers", () => {
      const decision = createService({ exposedHeaders: "X-Custom" }).evaluate(get({ origin: "http://a.com" }));

      expect(decision.action).toBe("forward-with-headers");
      expect(decision.headers["Access-Control-Expose-Headers"]).toBe("X-Custom");
    });

    it("should not send the expose header when none is configured", () => {
      const decision = createService().evaluate(get({ origin: "http://a.com" }));

      expect(decision.headers).toEqual({ Vary: "Origin", "Access-Control-Allow-Origin": "http://a.com" });
    });

    it("should treat OPTIONS without a requested method as a simple request", () => {
      const decision = createService({ exposedHeaders: "X-Custom" }).evaluate({
        method: "OPTIONS",
        headers: { origin: "http://a.com" },
      });

      expect(decision.action).toBe("forward-with-headers");
      expect(decision.preflight).toBe(false);
      expect(decision.headers["Access-Control-Expose-Headers"]).toBe("X-Custom");
    });

    it("should treat OPTIONS with an empty requested method as a simple request", () => {
      const decision = createService().evaluate(preflight(""));

      expect(decision.action).toBe("forward-with-headers");
    });

    it("should not treat a non-OPTIONS request with a requested method as a preflight", () => {
      const decision = createService().evaluate({
        method: "POST",
        headers: { origin: "http://a.com", "access-control-request-method": "DELETE" },
      });

      expect(decision.action).toBe("forward-with-headers");
      expect(decision.headers).not.toHaveProperty("Access-Control-Allow-Methods");
    });
  });

  describe("preflight requests", () => {
    it("should approve anything when header validation is disabled", () => {
      const service = createService({ validateHeaders: false, maxAge: 60000 });

      const decision = service.evaluate(preflight("DELETE", "X-Unknown"));

      expect(decision).toEqual({
        action: "respond-preflight-ok",
        headers: {
          Vary: "Origin",
          "Access-Control-Allow-Methods": "GET, POST",
          "Access-Control-Allow-Headers": "X-Foo, x-bar",
          "Access-Control-Max-Age": "60",
          "Access-Control-Allow-Origin": "http://a.com",
        },
        origin: "http://a.com",
        preflight: true,
      });
    });

    it("should not send exposed headers on preflight", () => {
      const decision = createService({ exposedHeaders: "X-Custom" }).evaluate(preflight("GET"));

      expect(decision.headers).not.toHaveProperty("Access-Control-Expose-Headers");
    });

    it("should omit Max-Age when it is zero", () => {
      const decision = createService({ maxAge: 0 }).evaluate(preflight("GET"));

      expect(decision.action).toBe("respond-preflight-ok");
      expect(decision.headers).not.toHaveProperty("Access-Control-Max-Age");
    });

    it("should omit Max-Age when half a second rounds down to zero", () => {
      const decision = createService({ maxAge: 500 }).evaluate(preflight("GET"));

      expect(decision.action).toBe("respond-preflight-ok");
      expect(decision.headers).not.toHaveProperty("Access-Control-Max-Age");
    });

    it("should reject a method outside the allowed set", () => {
      const decision = createService().evaluate(preflight("PUT"));

      expect(decision).toEqual({
        action: "reject",
        headers: { Vary: "Origin" },
        origin: "http://a.com",
        preflight: true,
        reason: "method-not-allowed",
      });
    });

    it("should match methods case-sensitively", () => {
      expect(createService().evaluate(preflight("get")).reason).toBe("method-not-allowed");
    });

    it("should match requested headers case-insensitively after trimming", () => {
      const decision = createService().evaluate(preflight("POST", "X-Foo, x-bar"));

      expect(decision.action).toBe("respond-preflight-ok");
    });

    it("should reject when one requested header is not allowed", () => {
      const decision = createService().evaluate(preflight("POST", "X-Foo, X-Baz"));

      expect(decision.action).toBe("reject");
      expect(decision.reason).toBe("headers-not-allowed");
      expect(decision.headers).toEqual({ Vary: "Origin" });
    });

    it("should treat an empty requested headers value as no headers", () => {
      expect(createService().evaluate(preflight("GET", "")).action).toBe("respond-preflight-ok");
    });

    it("should accept a preflight without requested headers", () => {
      expect(createService().evaluate(preflight("GET")).action).toBe("respond-preflight-ok");
    });

    it("should reject a preflight from a foreign origin before validating", () => {
      const decision = createService({ validateHeaders: false }).evaluate(preflight("GET", undefined, "http://evil.com"));

      expect(decision.reason).toBe("origin-mismatch");
      expect(decision.preflight).toBe(false);
    });
  });

  describe("matching primitives", () => {
    it("should not allow an empty method", () => {
      expect(createService().isMethodAllowed("")).toBe(false);
    });

    it("should ignore empty tokens between commas", () => {
      expect(createService().areHeadersAllowed("x-foo, ,X-BAR,")).toBe(true);
    });
  });

  describe("logging", () => {
    let logger: AppLoggingService;

    beforeEach(() => {
      logger = new AppLoggingService();
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it("should log rejections as security events when enabled", () => {
      const spy = vi.spyOn(logger, "logSecurityEvent");

      createService({ logViolations: true }, logger).evaluate(get({ origin: "http://evil.com" }));

      expect(spy).toHaveBeenCalledWith("CORS request rejected", {
        origin: "http://evil.com",
        method: "GET",
        preflight: false,
        reason: "origin-mismatch",
      });
    });

    it("should stay quiet when violation logging is disabled", () => {
      const spy = vi.spyOn(logger, "logSecurityEvent");

      createService({ logViolations: false }, logger).evaluate(get({ origin: "http://evil.com" }));

      expect(spy).not.toHaveBeenCalled();
    });

    it("should warn about origins that are not URLs", () => {
      const spy = vi.spyOn(logger, "warn");

      createService({ origins: "http://a.com, not-an-origin" }, logger).validateConfiguration();

      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy).toHaveBeenCalledWith("CORS: Invalid origin configured: not-an-origin", "CorsService");
    });

    it("should warn about wildcard origins with credentials", () => {
      const spy = vi.spyOn(logger, "warn");

      createService({ origins: "*", credentials: true }, logger).validateConfiguration();

      expect(spy).toHaveBeenCalledWith(
        "CORS: Wildcard origins with credentials enabled, the request origin is echoed instead of *",
        "CorsService",
      );
    });
  });

  describe("accessors", () => {
    it("should expose origins and credentials policy", () => {
      const service = createService({ origins: "http://a.com, http://b.com", credentials: true });

      expect(service.getOrigins()).toEqual(["http://a.com", "http://b.com"]);
      expect(service.getCredentialsPolicy()).toBe(true);
      expect(service.getPolicy().rawMethods).toBe("GET, POST");
    });
  });
});
