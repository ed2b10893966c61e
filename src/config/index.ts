/**
 * Configuration module exports
 *
 * Contains configuration interfaces and the environment based config loader.
 */

// Base configuration loader (loads from environment variables)
export * from "./base.config";

// Configuration interfaces
export * from "./interfaces";
