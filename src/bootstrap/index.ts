/**
 * Bootstrap utilities for NestJS applications
 */

export * from "./bootstrap";
export * from "./bootstrap.options";
export * from "./app.module.factory";
export * from "./cors.setup";
export * from "./defaults";
