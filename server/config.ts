import type { ReasoningStage } from "@shared/coordination";

export const DEFAULT_TOKEN_PATH = "/var/run/secrets/kubernetes.io/serviceaccount/token";

export interface StageModelConfig {
  providerId?: string;
  model?: string;
}

export interface AppConfig {
  port: number;
  clusterContext?: string;
  tokenPath: string;
  logTailLines: number;
  prometheus: {
    baseUrl: string;
    timeoutMs: number;
  };
  cryostat: {
    enabled: boolean;
    baseUrl: string;
    timeoutMs: number;
  };
  scan: {
    label: string;
    intervalMs: number;
    initialDelayMs: number;
    concurrency: number;
  };
  stages: Record<ReasoningStage, StageModelConfig>;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readFlag(env: Env, key: string, fallback: boolean): boolean {
  const raw = readString(env, key);
  if (!raw) return fallback;
  return ["1", "true", "yes"].includes(raw.toLowerCase());
}

function readInteger(env: Env, key: string, fallback: number, min = 1): number {
  const raw = readString(env, key);
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < min) return fallback;
  return parsed;
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

function readStage(env: Env, prefix: string): StageModelConfig {
  return {
    providerId: readString(env, `${prefix}_PROVIDER`),
    model: readString(env, `${prefix}_MODEL`),
  };
}

export function loadConfig(env: Env = process.env): AppConfig {
  return Object.freeze({
    port: readInteger(env, "PORT", 4000),
    clusterContext: readString(env, "KUBE_CONTEXT"),
    tokenPath: readString(env, "SERVICE_ACCOUNT_TOKEN_PATH") || DEFAULT_TOKEN_PATH,
    logTailLines: readInteger(env, "RCA_LOG_TAIL_LINES", 500),
    prometheus: {
      baseUrl: trimTrailingSlash(readString(env, "PROMETHEUS_URL") || "http://localhost:9090"),
      timeoutMs: readInteger(env, "PROMETHEUS_TIMEOUT_MS", 8000),
    },
    cryostat: {
      enabled: readFlag(env, "CRYOSTAT_ENABLED", false),
      baseUrl: trimTrailingSlash(readString(env, "CRYOSTAT_URL") || "http://localhost:8181"),
      timeoutMs: readInteger(env, "CRYOSTAT_TIMEOUT_MS", 15_000),
    },
    scan: {
      label: readString(env, "RCA_SCAN_LABEL") || "rca.enabled=true",
      // 0 leaves the scheduler off
      intervalMs: readInteger(env, "RCA_SCAN_INTERVAL_MS", 0, 0),
      initialDelayMs: readInteger(env, "RCA_SCAN_INITIAL_DELAY_MS", 10_000, 0),
      concurrency: readInteger(env, "RCA_SCAN_CONCURRENCY", 2),
    },
    stages: {
      detector: readStage(env, "RCA_DETECTOR"),
      analyst: readStage(env, "RCA_ANALYST"),
      validator: readStage(env, "RCA_VALIDATOR"),
    },
  });
}
