/**
 * Configuration interface exports
 */

export * from "./base.config.interface";
export * from "./config.api.interface";
export * from "./config.cors.interface";
export * from "./config.logging.interface";
