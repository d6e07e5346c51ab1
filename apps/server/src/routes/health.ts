import type { FastifyInstance } from "fastify";

export function registerHealthRoutes(app: FastifyInstance): void {
  app.get("/api/health", async (_req, reply) => {
    return reply.send({ ok: true, service: "earthwork-server" });
  });
}
