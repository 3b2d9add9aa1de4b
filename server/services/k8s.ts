import type { KubectlResult, KubectlRunOptions } from "@shared/kubectl";
import { getKubectlRunner } from "../commands/kubectl";

export interface PodResourceSpec {
  limits?: Record<string, string>;
  requests?: Record<string, string>;
}

export interface ContainerStatusSummary {
  name: string;
  ready: boolean;
  restartCount: number;
  waiting?: { reason?: string; message?: string };
  lastTerminated?: { reason?: string; exitCode?: number; finishedAt?: string };
}

export interface PodStatusSummary {
  phase: string;
  containers: ContainerStatusSummary[];
}

export interface PodEvent {
  timestamp: string;
  type: string;
  reason: string;
  message: string;
}

export interface PodRef {
  namespace: string;
  name: string;
}

/**
 * Read-only view of the cluster used by the collectors and the scanner.
 */
export interface ClusterInfo {
  getPodSpec(namespace: string, name: string): Promise<PodResourceSpec | null>;
  getPodStatus(namespace: string, name: string): Promise<PodStatusSummary | null>;
  getEvents(namespace: string, podName: string): Promise<PodEvent[]>;
  getLogs(namespace: string, name: string, tailLines: number, previous: boolean): Promise<string>;
  listPodsByLabel(labelSelector: string): Promise<PodRef[]>;
}

interface KubeContainerState {
  waiting?: { reason?: string; message?: string };
  terminated?: { reason?: string; exitCode?: number; finishedAt?: string };
}

interface KubePod {
  metadata?: { name?: string; namespace?: string };
  spec?: {
    containers?: Array<{
      name?: string;
      resources?: PodResourceSpec;
    }>;
  };
  status?: {
    phase?: string;
    containerStatuses?: Array<{
      name?: string;
      ready?: boolean;
      restartCount?: number;
      state?: KubeContainerState;
      lastState?: KubeContainerState;
    }>;
  };
}

interface KubeEvent {
  type?: string;
  reason?: string;
  message?: string;
  lastTimestamp?: string;
  eventTime?: string;
  firstTimestamp?: string;
  involvedObject?: { kind?: string; name?: string };
}

const NOT_FOUND_PATTERN = /\(NotFound\)|not found/i;

function parseJson<T>(raw: string): T {
  return JSON.parse(raw) as T;
}

function runKubectl(args: string[], options: KubectlRunOptions): Promise<KubectlResult> {
  return getKubectlRunner().run(args, options);
}

// Truncated output is never parsed.
function parseListing<T>(result: KubectlResult, what: string): T {
  if (result.truncated) {
    throw new Error(`${what} exceeded the kubectl output limit`);
  }
  return parseJson<T>(result.stdout);
}

export class KubectlClusterInfo implements ClusterInfo {
  private async getPod(namespace: string, name: string): Promise<KubePod | null> {
    const result = await runKubectl(["get", "pods", name, "-n", namespace, "-o", "json"], {
      timeoutMs: 20_000,
      maxOutputBytes: 2 * 1024 * 1024,
    });

    if (result.exitCode !== 0) {
      if (NOT_FOUND_PATTERN.test(result.stderr)) return null;
      throw new Error(result.stderr || "Failed to fetch pod");
    }

    return parseListing<KubePod>(result, `Pod ${namespace}/${name}`);
  }

  async getPodSpec(namespace: string, name: string): Promise<PodResourceSpec | null> {
    const pod = await this.getPod(namespace, name);
    const container = pod?.spec?.containers?.[0];
    if (!container) return null;

    return {
      limits: container.resources?.limits,
      requests: container.resources?.requests,
    };
  }

  async getPodStatus(namespace: string, name: string): Promise<PodStatusSummary | null> {
    const pod = await this.getPod(namespace, name);
    if (!pod) return null;

    const containers = (pod.status?.containerStatuses || []).map((entry) => ({
      name: entry.name || "unknown",
      ready: entry.ready === true,
      restartCount: Number(entry.restartCount || 0),
      waiting: entry.state?.waiting,
      lastTerminated: entry.lastState?.terminated,
    }));

    return {
      phase: pod.status?.phase || "Unknown",
      containers,
    };
  }

  async getEvents(namespace: string, podName: string): Promise<PodEvent[]> {
    const result = await runKubectl(
      [
        "get",
        "events",
        "-n",
        namespace,
        "--field-selector",
        `involvedObject.name=${podName}`,
        "-o",
        "json",
      ],
      { timeoutMs: 20_000, maxOutputBytes: 2 * 1024 * 1024 },
    );

    if (result.exitCode !== 0) {
      throw new Error(result.stderr || "Failed to fetch events");
    }
    if (!result.stdout) return [];

    const payload = parseListing<{ items?: KubeEvent[] }>(result, `Events for ${podName}`);

    return (payload.items || [])
      .filter((item) => item.involvedObject?.name === podName)
      .map((item) => ({
        timestamp: item.lastTimestamp || item.eventTime || item.firstTimestamp || "unknown",
        type: item.type || "Normal",
        reason: item.reason || "Unknown",
        message: item.message || "",
      }));
  }

  async getLogs(
    namespace: string,
    name: string,
    tailLines: number,
    previous: boolean,
  ): Promise<string> {
    const lines = Math.max(1, Math.min(tailLines, 10_000));
    const args = ["logs", name, "-n", namespace, "--tail", String(lines)];
    if (previous) args.push("--previous");

    const result = await runKubectl(args, {
      timeoutMs: 20_000,
      maxOutputBytes: 4 * 1024 * 1024,
    });

    if (result.exitCode !== 0) {
      throw new Error(result.stderr || "Failed to fetch pod logs");
    }

    return result.stdout;
  }

  async listPodsByLabel(labelSelector: string): Promise<PodRef[]> {
    const result = await runKubectl(["get", "pods", "-A", "-l", labelSelector, "-o", "json"], {
      timeoutMs: 30_000,
      maxOutputBytes: 8 * 1024 * 1024,
    });

    if (result.exitCode !== 0) {
      throw new Error(result.stderr || "Failed to list pods");
    }
    if (!result.stdout) return [];

    const payload = parseListing<{ items?: KubePod[] }>(result, `Pods matching ${labelSelector}`);

    return (payload.items || []).flatMap((item) => {
      const name = item.metadata?.name;
      if (!name) return [];
      return [{ namespace: item.metadata?.namespace || "default", name }];
    });
  }
}
