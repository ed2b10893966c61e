export interface ConfigCorsInterface {
  /** Comma delimited list of allowed origins, or `*` to match every origin. */
  origins: string;
  /** Comma delimited list of accepted HTTP methods, sent verbatim on preflight. */
  methods: string;
  /** Comma delimited list of request headers the resource accepts, sent verbatim on preflight. */
  requestHeaders: string;
  /** Headers readable by the client beyond the simple response headers. Empty means none. */
  exposedHeaders: string;
  /** How long a client may cache a preflight answer, in milliseconds. */
  maxAge: number;
  credentials: boolean;
  /** When true, preflight method and headers must be a subset of the allowed ones. */
  validateHeaders: boolean;
  /** Status used to end rejected requests. Left unset, the reply keeps its default status. */
  rejectStatus?: number;
  logViolations: boolean;
}
