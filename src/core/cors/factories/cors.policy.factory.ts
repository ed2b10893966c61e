import { z } from "zod";
import { ConfigCorsInterface } from "../../../config/interfaces/config.cors.interface";
import { WILDCARD_ORIGIN } from "../constants/cors.constants";
import { CorsConfigurationError } from "../errors/cors.configuration.error";
import { CorsPolicy } from "../interfaces/cors.policy.interface";

export const MISSING_ORIGINS_MESSAGE =
  "You must set at least a single valid origin. If you don't want CORS to apply, simply remove the middleware.";

const corsConfigSchema = z.object({
  origins: z.string().refine((value) => splitList(value).length > 0, { message: MISSING_ORIGINS_MESSAGE }),
  methods: z.string(),
  requestHeaders: z.string(),
  exposedHeaders: z.string(),
  maxAge: z.number().finite().nonnegative(),
  credentials: z.boolean(),
  validateHeaders: z.boolean(),
  rejectStatus: z.number().int().min(200).max(599).optional(),
  logViolations: z.boolean(),
});

/**
 * Splits a comma delimited setting into trimmed, non-empty tokens.
 */
export function splitList(value: string): string[] {
  return value
    .split(",")
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

/**
 * Rounds to the nearest integer, ties to the even neighbour.
 */
function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;

  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Normalizes raw CORS settings into the immutable policy used for every request.
 *
 * @throws CorsConfigurationError when origins is empty or a value is out of range
 */
export function createCorsPolicy(config: ConfigCorsInterface): CorsPolicy {
  const parsed = corsConfigSchema.safeParse(config);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new CorsConfigurationError(`Invalid CORS configuration: ${issues.join("; ")}`, issues);
  }

  const settings = parsed.data;
  const forceOriginMatch = settings.origins.trim() === WILDCARD_ORIGIN;

  const policy: CorsPolicy = {
    origins: Object.freeze(forceOriginMatch ? [] : splitList(settings.origins)),
    forceOriginMatch,
    methods: Object.freeze(splitList(settings.methods)),
    rawMethods: settings.methods,
    requestHeaders: Object.freeze(splitList(settings.requestHeaders).map((header) => header.toLowerCase())),
    rawRequestHeaders: settings.requestHeaders,
    exposedHeaders: settings.exposedHeaders,
    maxAge: String(roundHalfEven(settings.maxAge / 1000)),
    credentials: settings.credentials,
    renderedCredentials: settings.credentials ? "true" : "false",
    validateHeaders: settings.validateHeaders,
    rejectStatus: settings.rejectStatus,
    logViolations: settings.logViolations,
  };

  return Object.freeze(policy);
}
