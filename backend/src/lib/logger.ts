import type { FastifyBaseLogger } from "fastify";

/** Logging surface handed to services; Fastify's pino logger (`app.log`, `request.log`) satisfies it. */
export type AppLogger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;
