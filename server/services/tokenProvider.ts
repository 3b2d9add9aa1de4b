import { promises as fs } from "fs";

/**
 * Reads the service-account token once and hands out the cached
 * `Bearer <token>` header value to the HTTP collectors.
 *
 * Concurrent first callers share one read. A missing token file (running
 * outside a cluster) resolves to an empty string, which is cached as well.
 */
export class TokenProvider {
  private token: Promise<string> | null = null;

  constructor(private readonly tokenPath: string) {}

  getToken(): Promise<string> {
    if (!this.token) {
      this.token = this.readToken();
    }
    return this.token;
  }

  private async readToken(): Promise<string> {
    try {
      const raw = await fs.readFile(this.tokenPath, "utf8");
      console.log("[token] Service account token loaded.");
      return `Bearer ${raw.trim()}`;
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        console.warn(`[token] Token file not found at ${this.tokenPath}. Using empty token.`);
      } else {
        console.error("[token] Failed to read service account token:", error);
      }
      return "";
    }
  }
}
