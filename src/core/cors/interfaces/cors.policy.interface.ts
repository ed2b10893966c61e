export interface CorsPolicy {
  readonly origins: readonly string[];
  /** Set when origins is configured as `*`: every origin matches. */
  readonly forceOriginMatch: boolean;
  readonly methods: readonly string[];
  readonly rawMethods: string;
  /** Lower-cased, for case-insensitive comparison. */
  readonly requestHeaders: readonly string[];
  readonly rawRequestHeaders: string;
  readonly exposedHeaders: string;
  /** Whole seconds, ready for the header. "0" means the header is not sent. */
  readonly maxAge: string;
  readonly credentials: boolean;
  readonly renderedCredentials: "true" | "false";
  readonly validateHeaders: boolean;
  readonly rejectStatus?: number;
  readonly logViolations: boolean;
}
