import { serve } from "@hono/node-server";
import { getServerPort, loadApiKeys, loadSettings } from "./src/config/env.ts";
import { connectSharedCache, disconnectSharedCache, initializeAdapters } from "./src/config/adapters.ts";
import { appDI } from "./src/config/AppDI.ts";
import { error, info, setLogLevel, warn } from "./src/config/logger.ts";

/**
 * Main entry point for the HTTP server
 */
async function main(): Promise<number> {
  const config = loadSettings().andThen((settings) =>
    loadApiKeys().andThen((apiKeys) =>
      getServerPort().map((port) => ({ settings, apiKeys, port }))
    )
  );
  if (config.isErr()) {
    error(`Invalid configuration: ${config.error.message} ${(config.error.issues ?? []).join("; ")}`);
    return 1;
  }

  const { settings, apiKeys, port } = config.value;
  if (settings.logLevel) {
    setLogLevel(settings.logLevel);
  }

  const adapterResult = initializeAdapters(apiKeys, settings);
  if (adapterResult.isErr()) {
    error(`Failed to initialize adapters: ${adapterResult.error.message}`);
    return 1;
  }

  const container = adapterResult.value;
  const connected = await connectSharedCache(container);
  if (connected.isErr()) {
    warn(`${connected.error.message}; continuing with the memory tier only`);
  }

  const app = appDI.initialize(container, settings).andThen((di) => di.getHttpApp());
  if (app.isErr()) {
    error(`Failed to initialize DI container: ${app.error.message}`);
    return 1;
  }

  const server = serve({ fetch: app.value.fetch, port });
  info(`Server running on http://localhost:${port}`);

  const shutdown = (signal: string) => {
    info(`Received ${signal}, shutting down`);
    server.close();
    disconnectSharedCache(container).match(
      () => process.exit(0),
      (e) => {
        warn(e.message);
        process.exit(0);
      },
    ).catch(() => process.exit(1));
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  return 0;
}

main()
  .then((code) => {
    if (code !== 0) process.exit(code);
  })
  .catch((e: unknown) => {
    error(`Fatal error: ${e instanceof Error ? e.message : String(e)}`);
    process.exit(1);
  });
