/**
 * Client errors
 */

import type { HttpMethod } from "./transport.ts";

export type ClientErrorCode = "API_ERROR" | "CONFIG_ERROR" | "WITHDRAWAL_NOT_ACKNOWLEDGED";

/**
 * The API answered with a non-2xx status
 */
export class ApiError extends Error {
  public readonly code = "API_ERROR" satisfies ClientErrorCode;
  public readonly status: number;
  public readonly method: HttpMethod;
  public readonly url: string;
  /** Response body as received; usually `{ error, description }` */
  public readonly body: unknown;

  constructor(status: number, method: HttpMethod, url: string, body: unknown) {
    super(`Failed to ${method} ${url}: ${status}${describeBody(body)}`);
    this.name = "ApiError";
    this.status = status;
    this.method = method;
    this.url = url;
    this.body = body;
  }

  get isNotFound(): boolean {
    return this.status === 404;
  }

  get isUnauthorized(): boolean {
    return this.status === 401;
  }
}

export class ConfigError extends Error {
  public readonly code = "CONFIG_ERROR" satisfies ClientErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/**
 * A payout withdrawal was attempted without acknowledging the fees.
 * Raised before any request is sent.
 */
export class WithdrawalNotAcknowledgedError extends Error {
  public readonly code = "WITHDRAWAL_NOT_ACKNOWLEDGED" satisfies ClientErrorCode;
  public readonly userId: string;
  public readonly amount: number;

  constructor(userId: string, amount: number) {
    super(`Withdrawal of ${amount} for user "${userId}" refused: acknowledgeFees must be true`);
    this.name = "WithdrawalNotAcknowledgedError";
    this.userId = userId;
    this.amount = amount;
  }
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

function describeBody(body: unknown): string {
  if (typeof body === "string" && body) {
    return ` - ${body}`;
  }
  if (typeof body === "object" && body !== null && "description" in body && typeof body.description === "string") {
    return ` - ${body.description}`;
  }
  return "";
}
