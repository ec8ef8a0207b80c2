import type { Context } from "hono";
import { Hono } from "hono";
import { err, ok, Result, ResultAsync } from "neverthrow";
import { z } from "zod";
import type { SearchUseCase } from "../../../application/ports/in/SearchUseCase.ts";
import type { DomainError } from "../../../domain/models/errors.ts";
import { getErrorStatusCode } from "../../../domain/models/errors.ts";
import { CONTENT_TYPES, STRATEGY_NAMES } from "../../../domain/models/routing.ts";
import type { SearchError, SearchQuery } from "../../../domain/models/search.ts";
import { debug } from "../../../config/logger.ts";
import { domainErrorToResponse, searchErrorToDomainError } from "./errors.ts";

const numeric = z.string().regex(/^\d+$/, "must be a whole number").transform(Number);

const SearchParamsSchema = z.object({
  q: z.string().default(""),
  maxResults: numeric.optional(),
  contentType: z.enum(CONTENT_TYPES).optional(),
  providers: z
    .string()
    .transform((value) => value.split(",").map((id) => id.trim()).filter((id) => id.length > 0))
    .optional(),
  budget: z.string().optional(),
  timeoutMs: numeric.optional(),
  strategy: z.enum(STRATEGY_NAMES).optional(),
  routingHints: z.string().optional(),
  requireAllProviders: z.enum(["true", "false"]).transform((value) => value === "true").optional(),
});

const SearchBodySchema = z.object({
  q: z.string(),
  maxResults: z.number().optional(),
  contentType: z.enum(CONTENT_TYPES).optional(),
  providers: z.array(z.string()).optional(),
  budget: z.union([z.number(), z.string()]).optional(),
  timeoutMs: z.number().optional(),
  strategy: z.enum(STRATEGY_NAMES).optional(),
  routingHints: z.string().optional(),
  requireAllProviders: z.boolean().optional(),
});

function validationError(error: z.ZodError): DomainError {
  return {
    type: "validation",
    message: "Invalid search request",
    details: {
      issues: error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    },
  };
}

/**
 * Controller for the HTTP search endpoints
 */
export class SearchController {
  constructor(private readonly searchUseCase: SearchUseCase) {}

  createRouter(): Hono {
    const router = new Hono();

    router.get("/search", async (c) => {
      const parsed = SearchParamsSchema.safeParse(c.req.query());
      if (!parsed.success) {
        return this.respondError(c, validationError(parsed.error));
      }
      return await this.handleSearchRequest(c, parsed.data);
    });

    router.post("/search", async (c) => {
      const body = await this.parseRequestBody(c);
      if (body.isErr()) {
        return this.respondError(c, body.error);
      }
      return await this.handleSearchRequest(c, body.value);
    });

    return router;
  }

  private async handleSearchRequest(c: Context, query: SearchQuery): Promise<Response> {
    debug(`[HTTP] search "${query.q}"`);
    const result = await this.searchUseCase.search(query);

    return result.match(
      (response) => c.json(response),
      (error) => this.handleSearchError(c, error),
    );
  }

  private async parseRequestBody(c: Context): Promise<Result<SearchQuery, DomainError>> {
    return await ResultAsync.fromPromise(
      c.req.json<unknown>(),
      (e): DomainError => ({
        type: "parse",
        message: e instanceof Error ? e.message : "Request body is not valid JSON",
      }),
    ).andThen((data) => {
      const parsed = SearchBodySchema.safeParse(data);
      return parsed.success ? ok(parsed.data) : err(validationError(parsed.error));
    });
  }

  private handleSearchError(c: Context, error: SearchError): Response {
    if (error.type === "providers_unavailable") {
      c.header("Retry-After", String(Math.max(1, Math.ceil(error.retryAfterMs / 1000))));
    }
    const data = error.type === "partial_results" ? error.response : null;
    return this.respondError(c, searchErrorToDomainError(error), data);
  }

  private respondError<D>(c: Context, error: DomainError, data?: D): Response {
    return c.json(domainErrorToResponse(error, data), { status: getErrorStatusCode(error) });
  }
}
