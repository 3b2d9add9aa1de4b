export class UpstreamHttpError extends Error {
  code: "UPSTREAM_HTTP_ERROR" | "UPSTREAM_TIMEOUT" | "UPSTREAM_UNREACHABLE";
  retryable: boolean;
  status?: number;

  constructor(
    code: UpstreamHttpError["code"],
    message: string,
    retryable: boolean,
    status?: number,
  ) {
    super(message);
    this.name = "UpstreamHttpError";
    this.code = code;
    this.retryable = retryable;
    this.status = status;
  }
}

/**
 * GET against a monitoring backend with a bearer token and a hard timeout.
 * Non-2xx responses raise `UpstreamHttpError` carrying the status.
 */
export async function upstreamGet(params: {
  url: string;
  authorization?: string;
  timeoutMs: number;
  accept?: string;
}): Promise<Response> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), params.timeoutMs);

  const headers: Record<string, string> = { accept: params.accept || "application/json" };
  if (params.authorization) {
    headers.authorization = params.authorization;
  }

  try {
    const response = await fetch(params.url, {
      method: "GET",
      headers,
      signal: controller.signal,
    });

    if (!response.ok) {
      const body = (await response.text().catch(() => "")).trim().slice(0, 300);
      throw new UpstreamHttpError(
        "UPSTREAM_HTTP_ERROR",
        `GET ${new URL(params.url).pathname} failed (${response.status})${body ? `: ${body}` : ""}`,
        response.status >= 500 || response.status === 429,
        response.status,
      );
    }

    return response;
  } catch (error) {
    if (error instanceof UpstreamHttpError) throw error;
    if (controller.signal.aborted) {
      throw new UpstreamHttpError(
        "UPSTREAM_TIMEOUT",
        `GET ${params.url} timed out after ${params.timeoutMs}ms`,
        true,
      );
    }
    throw new UpstreamHttpError(
      "UPSTREAM_UNREACHABLE",
      `GET ${params.url} failed: ${error instanceof Error ? error.message : String(error)}`,
      true,
    );
  } finally {
    clearTimeout(timeout);
  }
}
