/**
 * Raised while building the CORS policy. It stops the module from being
 * created, so an application with an unusable CORS setup never starts.
 */
export class CorsConfigurationError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [message],
  ) {
    super(message);
    this.name = "CorsConfigurationError";
  }
}
