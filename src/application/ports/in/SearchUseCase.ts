import { ResultAsync } from "neverthrow";
import type { SearchError, SearchQuery, SearchResponse } from "../../../domain/models/search.ts";
import type { McpError, McpRequest, McpSuccessResponse } from "../../../domain/models/mcp.ts";

/**
 * Input port for search functionality
 * Defines the interface for search operations that can be used by controllers or other input adapters
 */
export interface SearchUseCase {
  search(query: SearchQuery): ResultAsync<SearchResponse, SearchError>;

  searchMcp(request: McpRequest): ResultAsync<McpSuccessResponse, McpError>;
}
