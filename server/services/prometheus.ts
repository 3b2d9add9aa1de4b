import { TokenProvider } from "./tokenProvider";
import { upstreamGet } from "./upstream";

export type PrometheusSample = [number, string];

export interface PrometheusSeries {
  metric?: Record<string, string>;
  value?: PrometheusSample;
  values?: PrometheusSample[];
}

export interface PrometheusQueryResponse {
  status?: string;
  data?: {
    resultType?: string;
    result?: PrometheusSeries[];
  };
  error?: string;
}

export interface MetricsBackend {
  query(expr: string): Promise<PrometheusQueryResponse>;
}

/**
 * Instant-query client for the Prometheus HTTP API (`/api/v1/query`).
 */
export class PrometheusClient implements MetricsBackend {
  constructor(
    private readonly options: {
      baseUrl: string;
      timeoutMs: number;
      tokenProvider: TokenProvider;
    },
  ) {}

  async query(expr: string): Promise<PrometheusQueryResponse> {
    const url = new URL(`${this.options.baseUrl}/api/v1/query`);
    url.searchParams.set("query", expr);

    const response = await upstreamGet({
      url: url.toString(),
      authorization: await this.options.tokenProvider.getToken(),
      timeoutMs: this.options.timeoutMs,
    });

    return (await response.json()) as PrometheusQueryResponse;
  }
}
