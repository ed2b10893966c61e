/**
 * Standard FastifyAdapter options for API applications
 */
export const defaultFastifyOptions = {
  ignoreTrailingSlash: true,
  bodyLimit: 10 * 1024 * 1024, // 10MB
};
