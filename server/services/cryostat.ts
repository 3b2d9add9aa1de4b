import { TokenProvider } from "./tokenProvider";
import { upstreamGet } from "./upstream";

export interface ProfilingBackend {
  getReport(target: string): Promise<string>;
}

/**
 * Fetches the JFR analysis report Cryostat keeps for a target pod.
 */
export class CryostatClient implements ProfilingBackend {
  constructor(
    private readonly options: {
      baseUrl: string;
      timeoutMs: number;
      tokenProvider: TokenProvider;
    },
  ) {}

  async getReport(target: string): Promise<string> {
    const response = await upstreamGet({
      url: `${this.options.baseUrl}/api/v1/targets/${encodeURIComponent(target)}/reports`,
      authorization: await this.options.tokenProvider.getToken(),
      timeoutMs: this.options.timeoutMs,
      accept: "application/json, text/plain",
    });

    return response.text();
  }
}
