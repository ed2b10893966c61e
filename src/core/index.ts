/**
 * Core module exports
 *
 * Contains infrastructure modules: logging and cors.
 */

export * from "./core.module";

export * from "./cors";
export * from "./logging";
