/**
 * nestjs-cors-gate
 *
 * CORS request mediation for NestJS applications on Fastify.
 */

import "reflect-metadata";

// Common exports
export * from "./common/filters";

// Config exports
export * from "./config";

// Core module exports
export * from "./core";

// Bootstrap utilities
export * from "./bootstrap";
