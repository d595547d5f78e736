import type { FastifyPluginAsync } from "fastify";

/** Liveness of the exporter process itself; never contacts the cluster */
export const healthRoutes: FastifyPluginAsync = async (app) => {
  app.get("/", async (_request, reply) => {
    return reply.send({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });
};
