export const ORIGIN_HEADER = "Origin";
export const VARY_HEADER = "Vary";
export const REQUEST_METHOD_HEADER = "Access-Control-Request-Method";
export const REQUEST_HEADERS_HEADER = "Access-Control-Request-Headers";

export const ALLOW_ORIGIN_HEADER = "Access-Control-Allow-Origin";
export const ALLOW_CREDENTIALS_HEADER = "Access-Control-Allow-Credentials";
export const ALLOW_METHODS_HEADER = "Access-Control-Allow-Methods";
export const ALLOW_HEADERS_HEADER = "Access-Control-Allow-Headers";
export const MAX_AGE_HEADER = "Access-Control-Max-Age";
export const EXPOSE_HEADERS_HEADER = "Access-Control-Expose-Headers";

export const WILDCARD_ORIGIN = "*";
export const OPTIONS_METHOD = "OPTIONS";

/**
 * Injection tokens
 */
export const CORS_OPTIONS = Symbol("CORS_OPTIONS");
export const CORS_POLICY = Symbol("CORS_POLICY");
export const CORS_REJECT_HANDLER = Symbol("CORS_REJECT_HANDLER");
