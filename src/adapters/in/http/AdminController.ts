import { Hono } from "hono";
import type { AdminUseCase } from "../../../application/ports/in/AdminUseCase.ts";
import type { DomainError } from "../../../domain/models/errors.ts";
import { getErrorStatusCode } from "../../../domain/models/errors.ts";
import { domainErrorToResponse } from "./errors.ts";

/**
 * Read-only provider status and cache maintenance
 */
export class AdminController {
  constructor(private readonly adminUseCase: AdminUseCase) {}

  createRouter(): Hono {
    const router = new Hono();

    router.get("/providers", (c) => {
      return c.json({ status: "success", providers: this.adminUseCase.providerStatus() });
    });

    router.delete("/cache", async (c) => {
      const pattern = c.req.query("pattern")?.trim();
      if (!pattern) {
        const error: DomainError = { type: "validation", message: "Query parameter 'pattern' is required" };
        return c.json(domainErrorToResponse(error), { status: getErrorStatusCode(error) });
      }

      return (await this.adminUseCase.invalidateCache(pattern)).match(
        (invalidation) => c.json({ status: "success", ...invalidation }),
        (cacheError) => {
          const error: DomainError = { type: "server", message: cacheError.message };
          return c.json(domainErrorToResponse(error), { status: getErrorStatusCode(error) });
        },
      );
    });

    return router;
  }
}
