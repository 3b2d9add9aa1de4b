import { AgentError } from "@shared/coordination";

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

function statusOf(error: unknown): number | undefined {
  if (error instanceof Error && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

/**
 * Rate limits, server errors and network failures are worth another attempt.
 */
export function isRetryableError(error: unknown): boolean {
  const status = statusOf(error);
  if (status !== undefined) return RETRYABLE_STATUSES.has(status);

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("network") ||
      message.includes("timeout") ||
      message.includes("econnreset")
    );
  }

  return false;
}

export function getErrorCode(error: unknown): string {
  const status = statusOf(error);
  if (status !== undefined) {
    if (status === 401) return "UNAUTHORIZED";
    if (status === 403) return "FORBIDDEN";
    if (status === 404) return "NOT_FOUND";
    if (status === 429) return "RATE_LIMITED";
    if (status >= 500) return "SERVER_ERROR";
    return "API_ERROR";
  }

  if (error instanceof Error) {
    if (error.message.includes("timeout")) return "TIMEOUT";
    if (error.message.includes("network")) return "NETWORK_ERROR";
  }

  return "UNKNOWN_ERROR";
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `call` with exponential backoff on retryable failures. The last
 * failure is rethrown as an AgentError tagged with the provider name.
 */
export async function withRetries<T>(
  providerName: string,
  call: () => Promise<T>,
  options: { maxRetries?: number; retryDelayMs?: number } = {},
): Promise<T> {
  const maxRetries = options.maxRetries ?? 3;
  const retryDelayMs = options.retryDelayMs ?? 1000;

  let retryCount = 0;
  for (;;) {
    try {
      return await call();
    } catch (error) {
      retryCount++;
      const retryable = isRetryableError(error);

      if (!retryable || retryCount > maxRetries) {
        throw new AgentError(
          getErrorCode(error),
          `${providerName}: ${error instanceof Error ? error.message : "Unknown API error"}`,
          retryable,
          statusOf(error),
        );
      }

      await delay(retryDelayMs * Math.pow(2, retryCount - 1));
    }
  }
}
