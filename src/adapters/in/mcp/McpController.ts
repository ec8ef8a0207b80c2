import type { Context } from "hono";
import { Hono } from "hono";
import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { err, ok, Result, ResultAsync } from "neverthrow";
import type { AdminUseCase } from "../../../application/ports/in/AdminUseCase.ts";
import type { SearchUseCase } from "../../../application/ports/in/SearchUseCase.ts";
import { getErrorStatusCode } from "../../../domain/models/errors.ts";
import {
  createMcpErrorResponse,
  type McpError,
  type McpRequest,
  type McpResult,
  type McpSuccessResponse,
} from "../../../domain/models/mcp.ts";
import { CONTENT_TYPES, STRATEGY_NAMES } from "../../../domain/models/routing.ts";
import { error, info } from "../../../config/logger.ts";

const SearchOptionsSchema = z.object({
  maxResults: z.number().int().min(1).max(100).optional(),
  contentType: z.enum(CONTENT_TYPES).optional(),
  providers: z.array(z.string().min(1)).optional(),
  budget: z.number().nonnegative().optional(),
  timeoutMs: z.number().int().positive().optional(),
  strategy: z.enum(STRATEGY_NAMES).optional(),
  routingHints: z.string().max(200).optional(),
});

const McpRequestSchema = z.object({
  query: z.string().min(1).max(500),
  options: SearchOptionsSchema.optional(),
});

const SearchToolSchema = SearchOptionsSchema.extend({
  query: z.string().min(1).max(500).describe("Search query"),
});

export type SearchToolParams = z.infer<typeof SearchToolSchema>;

/**
 * Controller for the MCP tools and the MCP-shaped HTTP endpoint
 */
export class McpController {
  constructor(
    private readonly searchUseCase: SearchUseCase,
    private readonly adminUseCase: AdminUseCase,
  ) {}

  /**
   * Register the search and provider_status tools with the MCP server
   */
  registerTools(server: McpServer): void {
    server.tool(
      "search",
      "Search several providers at once and return one merged, deduplicated, ranked list",
      SearchToolSchema.shape,
      (params) => this.searchTool(params),
    );

    server.tool(
      "provider_status",
      "Show circuit, rate-limit, budget and performance state for every provider",
      () => this.providerStatusTool(),
    );
  }

  async searchTool(params: SearchToolParams): Promise<CallToolResult> {
    info(`[MCP_CONTROLLER] search tool: ${params.query}`);
    const { query, ...options } = params;

    return (await this.searchUseCase.searchMcp({ query, options })).match(
      (response): CallToolResult => ({
        content: [{ type: "text", text: this.formatSearchResults(response) }],
      }),
      (e): CallToolResult => {
        error(`[MCP_CONTROLLER] Search error: ${e.type} - ${e.message}`);
        return {
          content: [{ type: "text", text: this.formatError(e) }],
          isError: true,
        };
      },
    );
  }

  providerStatusTool(): CallToolResult {
    return {
      content: [{ type: "text", text: JSON.stringify(this.adminUseCase.providerStatus(), null, 2) }],
    };
  }

  formatSearchResults(response: McpSuccessResponse): string {
    if (response.results.length === 0) {
      return "No results found.";
    }

    const header = `Providers: ${response.providersUsed.join(", ")} | cost ${response.totalCost}` +
      (response.cacheHit ? " | cached" : "");
    const body = response.results.map((result, index) => this.formatResult(result, index)).join("\n");
    return `${header}\n\n${body}`;
  }

  private formatResult(result: McpResult, index: number): string {
    const publishedDate = result.published ? ` (${result.published.substring(0, 10)})` : "";
    return `${index + 1}. ${result.title}${publishedDate} [Sources: ${result.sources.join(", ")}]
   URL: ${result.url}
   ${result.snippet}
`;
  }

  private formatError(e: McpError): string {
    switch (e.type) {
      case "validation":
        return `Validation error: ${e.message}`;
      case "budget":
        return `Budget exceeded: ${e.message}`;
      case "unavailable":
        return `No provider available: ${e.message}`;
      case "search":
        return `Search error: ${e.message}`;
      default:
        return `Error: ${e.message}`;
    }
  }

  createRouter(): Hono {
    const router = new Hono();

    router.post("/search", async (c) => {
      return (await this.parseRequestBody(c)
        .andThen((data) => this.validateRequest(data))
        .andThen((request) => this.searchUseCase.searchMcp(request)))
        .match(
          (response) => {
            info(
              `[MCP_CONTROLLER] Search successful, returned ${response.results.length} results from ${
                response.providersUsed.join(", ")
              }`,
            );
            return c.json(response);
          },
          (e) => this.handleError(c, e),
        );
    });

    return router;
  }

  private parseRequestBody(c: Context): ResultAsync<unknown, McpError> {
    return ResultAsync.fromPromise(c.req.json<unknown>(), (e): McpError => {
      error(`[MCP_CONTROLLER] JSON parse error: ${e instanceof Error ? e.message : "Unknown error"}`);
      return { type: "parse", message: e instanceof Error ? e.message : "Unknown error" };
    });
  }

  private validateRequest(data: unknown): Result<McpRequest, McpError> {
    const parsed = McpRequestSchema.safeParse(data);
    return parsed.success ? ok(parsed.data) : err({
      type: "validation",
      message: "Validation error",
      details: { issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`) },
    });
  }

  private handleError(c: Context, e: McpError): Response {
    error(`[MCP_CONTROLLER] Search failed: ${e.type} - ${e.message}`);
    return c.json(
      createMcpErrorResponse(e.message, { type: e.type, ...(e.details ?? {}) }),
      { status: getErrorStatusCode(e) },
    );
  }
}
