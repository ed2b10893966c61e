/**
 * CORS module exports
 *
 * Decides per request which CORS headers to send, answers preflight
 * requests and stops requests from origins outside the configured policy.
 */

// Module
export * from "./cors.module";

// Constants and tokens
export * from "./constants/cors.constants";

// Errors
export * from "./errors/cors.configuration.error";

// Policy
export * from "./factories/cors.policy.factory";
export * from "./interfaces/cors.policy.interface";
export * from "./interfaces/cors.decision.interface";
export * from "./interfaces/cors.module.options.interface";

// Services
export * from "./services/cors.service";
export * from "./hooks/cors.hook";
