#!/usr/bin/env -S npx tsx

/**
 * Metasearch Hub command line interface
 *
 * Launches the MCP server over standard I/O, for use from MCP clients.
 */

import { err, ok, Result, ResultAsync } from "neverthrow";
import { connectSharedCache, disconnectSharedCache, initializeAdapters } from "./src/config/adapters.ts";
import type { AdapterContainer } from "./src/config/adapters.ts";
import { AppDI, type DIError } from "./src/config/AppDI.ts";
import { loadApiKeys, loadSettings } from "./src/config/env.ts";
import { error, info, setLogLevel, warn } from "./src/config/logger.ts";

type CliError =
  | { type: "setup"; message: string }
  | { type: "di"; error: DIError };

interface Setup {
  readonly di: AppDI;
  readonly container: AdapterContainer;
}

/**
 * Setup the dependency injection container
 */
function setupDependencyInjection(): Result<Setup, CliError> {
  const config = loadSettings().andThen((settings) =>
    loadApiKeys().map((apiKeys) => ({ settings, apiKeys }))
  );
  if (config.isErr()) {
    return err({ type: "setup", message: `Invalid configuration: ${config.error.message}` });
  }

  const { settings, apiKeys } = config.value;
  if (settings.logLevel) {
    setLogLevel(settings.logLevel);
  }

  const initAdaptersResult = initializeAdapters(apiKeys, settings);
  if (initAdaptersResult.isErr()) {
    return err({
      type: "setup",
      message: `Failed to initialize adapters: ${initAdaptersResult.error.message}`,
    });
  }

  const container = initAdaptersResult.value;
  return new AppDI().initialize(container, settings)
    .map((di) => ({ di, container }))
    .mapErr((e): CliError => ({ type: "di", error: e }));
}

/**
 * Start the MCP server
 */
function startServer(): ResultAsync<Setup, CliError> {
  return setupDependencyInjection().asyncAndThen((setup) => {
    info("Starting metasearch hub MCP server...");
    info("- search tool: enabled");
    info("- provider_status tool: enabled");

    return connectSharedCache(setup.container)
      .orElse((e) => {
        warn(`${e.message}; continuing with the memory tier only`);
        return ok(undefined);
      })
      .andThen(() => setup.di.startMcpServer().mapErr((e): CliError => ({ type: "di", error: e })))
      .map(() => setup);
  });
}

function getErrorMessage(e: CliError): string {
  switch (e.type) {
    case "setup":
      return e.message;
    case "di":
      return `DI error: ${e.error.type} - ${e.error.message}`;
  }
}

startServer()
  .match(
    (setup) => {
      process.stdin.on("close", () => {
        disconnectSharedCache(setup.container).match(
          () => process.exit(0),
          (e) => {
            warn(e.message);
            process.exit(0);
          },
        ).catch(() => process.exit(1));
      });
    },
    (e) => {
      error(`Fatal error: ${getErrorMessage(e)}`);
      process.exit(1);
    },
  )
  .catch((e: unknown) => {
    error(`Fatal error: ${e instanceof Error ? e.message : String(e)}`);
    process.exit(1);
  });
