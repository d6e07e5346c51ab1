// earthwork/apps/server/src/server.ts
import { loadEnv, loadServerConfig, resolveRepoRoot } from "./config/env";
import { buildServer } from "./app";

async function main(): Promise<void> {
  loadEnv(resolveRepoRoot());
  const config = loadServerConfig();
  const app = buildServer(config);

  const shutdown = (signal: string): void => {
    app.log.info({ signal }, "shutting down");
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error(err);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  await app.listen({ host: config.host, port: config.port });
}

main().catch((err: unknown) => {
  console.error(`FAIL: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
