/**
 * @modrinth-kit/client
 *
 * Typed client for the Modrinth v2 API.
 *
 * @example
 * ```typescript
 * import { ModrinthClient } from "@modrinth-kit/client";
 * import { allOf, anyOf, facet } from "@modrinth-kit/codec";
 *
 * const client = new ModrinthClient({ userAgent: "example/launcher/1.0.0" });
 *
 * const result = await client.searchProjects({
 *   query: "storage",
 *   facets: allOf(facet("project_type", ":", "mod"), anyOf(facet("versions", ":", "1.20.1"))),
 *   limit: 20,
 * });
 *
 * for (const hit of result.hits) {
 *   console.log(hit.slug, hit.downloads);
 * }
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Clients
// ============================================================================

export { idsParam, ModrinthClient } from "./client.ts";
export type { ProjectVersionsFilter, RequestOptions, SearchIndex, SearchOptions } from "./client.ts";

export { AuthenticatedModrinthClient } from "./authenticated-client.ts";
export type {
  AuthenticatedClientConfig,
  DeleteVersionFileOptions,
  GalleryImageEdit,
  SendMessageOptions,
  WithdrawOptions,
} from "./authenticated-client.ts";

// ============================================================================
// Configuration and Transport
// ============================================================================

export { DEFAULT_API_URL, resolveConfig, STAGING_API_URL } from "./config.ts";
export type { ModrinthClientConfig, ResolvedConfig } from "./config.ts";

export { buildUrl, createFetchTransport } from "./transport.ts";
export type {
  FetchTransportOptions,
  HttpMethod,
  HttpTransport,
  QueryValue,
  TransportRequest,
  TransportResponse,
} from "./transport.ts";

// ============================================================================
// Errors
// ============================================================================

export { ApiError, ConfigError, isApiError, WithdrawalNotAcknowledgedError } from "./errors.ts";
export type { ClientErrorCode } from "./errors.ts";
