import Fastify from "fastify";
import type { FastifyInstance } from "fastify";

import type { ServerConfig } from "./config/env";
import { registerCrossSectionVolumeRoutes } from "./routes/cross_section_volume";
import { registerHealthRoutes } from "./routes/health";

export function buildServer(config: ServerConfig): FastifyInstance {
  const app = Fastify({ logger: { level: config.logLevel }, bodyLimit: config.bodyLimitBytes });

  // Set before routes so every route picks it up.
  app.setErrorHandler((err, req, reply) => {
    req.log.error(err);
    const status = typeof err.statusCode === "number" && err.statusCode >= 400 ? err.statusCode : 500;
    return reply.code(status).send({ ok: false, error: err.message });
  });

  registerHealthRoutes(app);
  registerCrossSectionVolumeRoutes(app, { repoRoot: config.repoRoot, defaultProfile: config.defaultProfile });

  return app;
}
