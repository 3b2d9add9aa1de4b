import { spawn } from "child_process";
import {
  KubectlAuditEvent,
  KubectlPolicyDecision,
  KubectlResult,
  KubectlRunOptions,
} from "@shared/kubectl";
import { evaluateKubectlPolicy } from "./policy";
import { loadConfig } from "../config";

const DEFAULT_MAX_OUTPUT_BYTES = 256 * 1024;
const MAX_ALLOWED_OUTPUT_BYTES = 8 * 1024 * 1024;
const DEFAULT_TIMEOUT_MS = 15_000;
const MAX_TIMEOUT_MS = 60_000;

export const TRUNCATION_MARKER = "\n...[TRUNCATED]";

export class KubectlCommandError extends Error {
  code: "COMMAND_BLOCKED" | "COMMAND_FAILED" | "COMMAND_TIMEOUT";
  retryable: boolean;
  policyDecision?: KubectlPolicyDecision;

  constructor(
    code: KubectlCommandError["code"],
    message: string,
    retryable: boolean,
    policyDecision?: KubectlPolicyDecision,
  ) {
    super(message);
    this.name = "KubectlCommandError";
    this.code = code;
    this.retryable = retryable;
    this.policyDecision = policyDecision;
  }
}

function redactSensitiveOutput(output: string): string {
  return output
    .replace(/(api[_-]?key\s*[:=]\s*)([^\s]+)/gi, "$1[REDACTED]")
    .replace(/(token\s*[:=]\s*)([^\s]+)/gi, "$1[REDACTED]")
    .replace(/(password\s*[:=]\s*)([^\s]+)/gi, "$1[REDACTED]")
    .replace(/(secret\s*[:=]\s*)([^\s]+)/gi, "$1[REDACTED]");
}

function clampTimeout(timeoutMs?: number): number {
  if (!timeoutMs || Number.isNaN(timeoutMs)) return DEFAULT_TIMEOUT_MS;
  return Math.min(Math.max(timeoutMs, 1000), MAX_TIMEOUT_MS);
}

function clampOutputLimit(maxOutputBytes?: number): number {
  if (!maxOutputBytes || Number.isNaN(maxOutputBytes)) {
    return DEFAULT_MAX_OUTPUT_BYTES;
  }
  return Math.min(
    Math.max(maxOutputBytes, DEFAULT_MAX_OUTPUT_BYTES),
    MAX_ALLOWED_OUTPUT_BYTES,
  );
}

/**
 * Cuts `output` to at most `maxBytes` UTF-8 bytes on a character boundary.
 */
export function truncateOutput(
  output: string,
  maxBytes: number,
): { content: string; truncated: boolean } {
  const bytes = Buffer.from(output, "utf8");
  if (bytes.length <= maxBytes) {
    return { content: output, truncated: false };
  }

  let end = maxBytes;
  // Back up over UTF-8 continuation bytes (10xxxxxx).
  while (end > 0 && (bytes[end] & 0xc0) === 0x80) {
    end -= 1;
  }

  return {
    content: bytes.subarray(0, end).toString("utf8") + TRUNCATION_MARKER,
    truncated: true,
  };
}

export interface KubectlRunnerOptions {
  clusterContext?: string;
}

/**
 * Runs read-only kubectl commands from an argument list. No shell is
 * involved; every run is checked against the policy and audited.
 */
export class KubectlRunner {
  private readonly clusterContext?: string;

  constructor(options: KubectlRunnerOptions = {}) {
    const context = options.clusterContext?.trim();
    this.clusterContext = context ? context : undefined;
  }

  private audit(event: KubectlAuditEvent): void {
    console.log("[command-audit]", JSON.stringify(event));
  }

  async run(args: string[], options: KubectlRunOptions = {}): Promise<KubectlResult> {
    const startedAt = Date.now();
    const decision = evaluateKubectlPolicy(args);

    if (!decision.allowed) {
      throw new KubectlCommandError(
        "COMMAND_BLOCKED",
        decision.reason || "Command blocked by policy",
        false,
        decision,
      );
    }

    const argv = this.clusterContext ? ["--context", this.clusterContext, ...args] : args;
    const timeoutMs = clampTimeout(options.timeoutMs);
    const maxOutputBytes = clampOutputLimit(options.maxOutputBytes);

    return new Promise<KubectlResult>((resolve, reject) => {
      const child = spawn("kubectl", argv, {
        stdio: ["ignore", "pipe", "pipe"],
        env: process.env,
      });

      let stdout = "";
      let stderr = "";
      let timedOut = false;

      const timeout = setTimeout(() => {
        timedOut = true;
        child.kill("SIGTERM");
      }, timeoutMs);

      // Decode across chunk boundaries.
      child.stdout.setEncoding("utf8");
      child.stderr.setEncoding("utf8");

      child.stdout.on("data", (chunk: string) => {
        stdout += chunk;
      });

      child.stderr.on("data", (chunk: string) => {
        stderr += chunk;
      });

      child.on("error", (error) => {
        clearTimeout(timeout);
        reject(
          new KubectlCommandError(
            "COMMAND_FAILED",
            `Failed to execute kubectl: ${error.message}`,
            true,
            decision,
          ),
        );
      });

      child.on("close", (exitCode) => {
        clearTimeout(timeout);

        if (timedOut) {
          reject(
            new KubectlCommandError(
              "COMMAND_TIMEOUT",
              `kubectl ${decision.verb} timed out after ${timeoutMs}ms`,
              true,
              decision,
            ),
          );
          return;
        }

        const out = truncateOutput(redactSensitiveOutput(stdout), maxOutputBytes);
        const err = truncateOutput(redactSensitiveOutput(stderr), maxOutputBytes);
        const durationMs = Date.now() - startedAt;

        this.audit({
          verb: decision.verb,
          args,
          startedAt,
          durationMs,
          exitCode: exitCode ?? -1,
          truncated: out.truncated,
        });

        resolve({
          stdout: out.content,
          stderr: err.content,
          exitCode: exitCode ?? -1,
          executedAt: startedAt,
          durationMs,
          truncated: out.truncated,
        });
      });
    });
  }
}

let runner: KubectlRunner | null = null;

export function getKubectlRunner(): KubectlRunner {
  if (!runner) {
    runner = new KubectlRunner({ clusterContext: loadConfig().clusterContext });
  }
  return runner;
}
