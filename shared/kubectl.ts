/**
 * kubectl runner types
 */

export type KubectlVerb = "get" | "logs";

export interface KubectlRunOptions {
  timeoutMs?: number;
  maxOutputBytes?: number;
}

export interface KubectlResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  executedAt: number;
  durationMs: number;
  /** stdout was cut at the output limit */
  truncated: boolean;
}

export interface KubectlPolicyDecision {
  allowed: boolean;
  verb?: KubectlVerb;
  reason?: string;
}

export interface KubectlAuditEvent {
  verb?: KubectlVerb;
  args: string[];
  startedAt: number;
  durationMs: number;
  exitCode: number;
  truncated: boolean;
}
