import type { FastifyPluginAsync } from "fastify";

export type HealthRoutesOptions = {
  checkReadiness: () => Promise<void>;
};

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (app, options) => {
  app.get("/healthz", async () => ({ status: "ok" }));

  app.get("/readyz", async (request, reply) => {
    try {
      await options.checkReadiness();
      return {
        status: "ready",
      };
    } catch (error) {
      request.log.warn({ err: error }, "Readiness check failed");
      return reply.status(503).send({ status: "not_ready" });
    }
  });
};
