import { Hono } from "hono";
import { logger } from "hono/logger";
import { secureHeaders } from "hono/secure-headers";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { err, ok, Result, ResultAsync } from "neverthrow";
import type { AdminUseCase } from "../application/ports/in/AdminUseCase.ts";
import type { SearchUseCase } from "../application/ports/in/SearchUseCase.ts";
import { AdminService } from "../application/services/AdminService.ts";
import { AdmissionControl } from "../application/services/admission/AdmissionControl.ts";
import { type Clock, systemClock } from "../application/services/admission/Clock.ts";
import { PerformanceTracker } from "../application/services/PerformanceTracker.ts";
import { RoutingService } from "../application/services/RoutingService.ts";
import { DefaultProviderScorer, ScorerRegistry } from "../application/services/scoring/ProviderScorer.ts";
import { SearchService } from "../application/services/SearchService.ts";
import { TieredCacheService } from "../application/services/TieredCacheService.ts";
import { AdminController } from "../adapters/in/http/AdminController.ts";
import { ApiError, createErrorResponse, domainErrorToApiError } from "../adapters/in/http/errors.ts";
import { SearchController } from "../adapters/in/http/SearchController.ts";
import { McpController } from "../adapters/in/mcp/McpController.ts";
import { QueryAnalyzer } from "../domain/services/queryAnalyzer.ts";
import type { AdapterContainer } from "./adapters.ts";
import { debug, error, info } from "./logger.ts";
import { type HubSettings, providerSettings } from "./settings.ts";

export const APP_NAME = "metasearch-hub";
export const APP_VERSION = "0.4.0";

export type DIError =
  | { type: "already_initialized"; message: string }
  | { type: "not_initialized"; message: string }
  | { type: "transport"; message: string };

interface Services {
  readonly search: SearchService;
  readonly admin: AdminService;
}

/**
 * Dependency Injection container for the application
 */
export class AppDI {
  private services?: Services;
  private mcpController?: McpController;

  /**
   * Build the service graph over the given adapters
   */
  initialize(
    container: AdapterContainer,
    settings: HubSettings,
    clock: Clock = systemClock,
  ): Result<this, DIError> {
    if (this.services) {
      return err({
        type: "already_initialized",
        message: "AppDI already initialized",
      });
    }

    const admission = new AdmissionControl(clock);
    for (const adapter of container.providers.list()) {
      admission.register(adapter.id, providerSettings(settings, adapter.id));
    }

    const performance = new PerformanceTracker(clock);
    const routing = new RoutingService(
      container.providers,
      admission,
      new ScorerRegistry(new DefaultProviderScorer(clock)),
      performance,
      settings,
    );
    const cache = new TieredCacheService(container.memoryCache, settings.cache, container.sharedCache);

    this.services = {
      search: new SearchService(new QueryAnalyzer(), routing, cache, settings),
      admin: new AdminService(container.providers, admission, performance, cache, settings),
    };
    debug(`AppDI initialized with ${container.providers.size} provider(s)`);

    return ok(this);
  }

  /**
   * Check if the DI container has been initialized
   */
  isInitialized(): boolean {
    return this.services !== undefined;
  }

  getSearchService(): Result<SearchUseCase, DIError> {
    return this.getServices().map((services) => services.search);
  }

  getAdminService(): Result<AdminUseCase, DIError> {
    return this.getServices().map((services) => services.admin);
  }

  getMcpController(): Result<McpController, DIError> {
    return this.getServices().map((services) => {
      this.mcpController ??= new McpController(services.search, services.admin);
      return this.mcpController;
    });
  }

  /**
   * HTTP application: search, admin and MCP-shaped routes
   */
  getHttpApp(): Result<Hono, DIError> {
    return this.getServices().andThen((services) =>
      this.getMcpController().map((mcpController) => {
        const app = new Hono();
        app.use(logger((message) => info(message)));
        app.use(secureHeaders());

        app.get("/", (c) => c.json({ name: APP_NAME, status: "running", version: APP_VERSION }));
        app.route("/", new SearchController(services.search).createRouter());
        app.route("/admin", new AdminController(services.admin).createRouter());
        app.route("/mcp", mcpController.createRouter());

        app.notFound((c) => c.json(createErrorResponse("Not Found"), { status: 404 }));

        app.onError((e, c) => {
          error(`Error: ${e.message}`);
          const apiError = e instanceof ApiError
            ? e
            : domainErrorToApiError({ type: "server", message: "Internal Server Error" });
          return c.json(createErrorResponse(apiError.message, apiError.details), { status: apiError.status });
        });

        return app;
      })
    );
  }

  createMcpServer(): Result<McpServer, DIError> {
    return this.getMcpController().map((controller) => {
      const server = new McpServer({ name: APP_NAME, version: APP_VERSION });
      controller.registerTools(server);
      info("MCP server configured with search and provider_status tools");
      return server;
    });
  }

  startMcpServer(): ResultAsync<void, DIError> {
    info("Starting MCP server with stdio transport...");

    return this.createMcpServer()
      .asyncAndThen((server) =>
        ResultAsync.fromPromise(
          server.connect(new StdioServerTransport()),
          (transportError): DIError => ({
            type: "transport",
            message: transportError instanceof Error ? transportError.message : String(transportError),
          }),
        )
      )
      .map(() => info("MCP server connected via stdio transport"))
      .mapErr((e) => {
        error(`Failed to start MCP server: ${e.message}`);
        return e;
      });
  }

  private getServices(): Result<Services, DIError> {
    return this.services ? ok(this.services) : err({
      type: "not_initialized",
      message: "DI container not initialized. Call initialize() first.",
    });
  }
}

// Singleton instance of the DI container
export const appDI = new AppDI();
