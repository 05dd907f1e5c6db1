/**
 * Client configuration
 */

import { z } from "zod";
import { ConfigError } from "./errors.ts";
import { createFetchTransport, type HttpTransport } from "./transport.ts";

export const DEFAULT_API_URL = "https://api.modrinth.com/v2";
export const STAGING_API_URL = "https://staging-api.modrinth.com/v2";

export interface ModrinthClientConfig {
  /**
   * Identifies the application, e.g. `"my-org/launcher/1.4.0 (contact@example.com)"`.
   * Requests without a descriptive user agent may be blocked.
   */
  userAgent: string;
  /** API base URL (default: DEFAULT_API_URL) */
  baseUrl?: string;
  /** Personal access token */
  token?: string;
  /** Also send the token on requests that do not require it */
  alwaysUseAuth?: boolean;
  transport?: HttpTransport;
}

export interface ResolvedConfig {
  userAgent: string;
  baseUrl: string;
  token: string | undefined;
  alwaysUseAuth: boolean;
  transport: HttpTransport;
}

function isTransport(value: unknown): value is HttpTransport {
  return typeof value === "object" && value !== null && "request" in value && typeof value.request === "function";
}

const ConfigSchema = z.object({
  userAgent: z.string().trim().min(1, "userAgent must not be empty"),
  baseUrl: z.string().url().default(DEFAULT_API_URL),
  token: z.string().min(1, "token must not be empty").optional(),
  alwaysUseAuth: z.boolean().default(false),
  transport: z.custom<HttpTransport>(isTransport, "transport must have a request() method").optional(),
});

/**
 * Validate a config and fill in defaults
 * @throws ConfigError
 */
export function resolveConfig(config: ModrinthClientConfig): ResolvedConfig {
  const parsed = ConfigSchema.safeParse(config);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const where = issue?.path.join(".") || "config";
    throw new ConfigError(`Invalid client config: ${where}: ${issue?.message ?? parsed.error.message}`, {
      cause: parsed.error,
    });
  }

  const { userAgent, baseUrl, token, alwaysUseAuth, transport } = parsed.data;
  return {
    userAgent,
    baseUrl: baseUrl.replace(/\/+$/, ""),
    token,
    alwaysUseAuth,
    transport: transport ?? createFetchTransport(),
  };
}
