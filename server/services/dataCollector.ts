import type { DiagnosticContext } from "@shared/rca";
import type { ClusterInfo, PodEvent, PodStatusSummary } from "./k8s";
import type { ProfilingBackend } from "./cryostat";

export const PROFILING_DISABLED_MESSAGE = "JFR Analysis is disabled.";
export const NO_LOGS_MESSAGE = "No logs available (even from terminated container)";
export const NO_EVENTS_MESSAGE = "No events found for this pod.";

export interface MetricsSource {
  summarize(namespace: string, target: string): Promise<string>;
}

export interface DataCollectorOptions {
  cluster: ClusterInfo;
  metrics: MetricsSource;
  profiling: ProfilingBackend;
  profilingEnabled: boolean;
  logTailLines?: number;
}

type ContextSections = Omit<DiagnosticContext, "fullContext">;

export const MAX_LOG_TAIL_LINES = 500;

export function buildFullContext(sections: ContextSections): string {
  return [
    "--- POD STATUS ---",
    sections.podStatusText,
    "",
    "--- K8S EVENTS ---",
    sections.eventsText,
    "",
    "--- METRICS ---",
    sections.metricsText,
    "",
    "--- LOGS (Tail) ---",
    sections.logsText,
    "",
    "--- JFR ANALYSIS ---",
    sections.profilingText,
    "",
  ].join("\n");
}

export function createDiagnosticContext(sections: ContextSections): DiagnosticContext {
  return Object.freeze({
    podStatusText: sections.podStatusText,
    eventsText: sections.eventsText,
    metricsText: sections.metricsText,
    logsText: sections.logsText,
    profilingText: sections.profilingText,
    fullContext: buildFullContext(sections),
  });
}

export function formatPodStatus(status: PodStatusSummary): string {
  const lines = [`Phase: ${status.phase}`];

  for (const container of status.containers) {
    lines.push(`Container: ${container.name}`);
    lines.push(`  Ready: ${container.ready}`);
    lines.push(`  Restart Count: ${container.restartCount}`);
    if (container.waiting) {
      lines.push(`  Current State: Waiting (${container.waiting.reason ?? "unknown"})`);
      lines.push(`  Message: ${container.waiting.message ?? "none"}`);
    }
    if (container.lastTerminated) {
      lines.push(`  Last State: Terminated (${container.lastTerminated.reason ?? "unknown"})`);
      lines.push(`  Exit Code: ${container.lastTerminated.exitCode ?? "unknown"}`);
      lines.push(`  Finished At: ${container.lastTerminated.finishedAt ?? "unknown"}`);
    }
  }

  return `${lines.join("\n")}\n`;
}

export function formatEvents(events: PodEvent[]): string {
  if (events.length === 0) return NO_EVENTS_MESSAGE;
  return events
    .map(
      (event) =>
        `[${event.timestamp}] Type: ${event.type}, Reason: ${event.reason}, Message: ${event.message}\n`,
    )
    .join("");
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Gathers status, events, metrics, logs and the JFR report for one pod.
 * Each source fails on its own: its section carries the error text and the
 * remaining sections are still collected.
 */
export class DataCollector {
  private readonly logTailLines: number;

  constructor(private readonly options: DataCollectorOptions) {
    this.logTailLines = Math.min(options.logTailLines ?? MAX_LOG_TAIL_LINES, MAX_LOG_TAIL_LINES);
  }

  async fetchPodStatus(namespace: string, podName: string): Promise<string> {
    try {
      const status = await this.options.cluster.getPodStatus(namespace, podName);
      if (!status) return "Pod not found";
      return formatPodStatus(status);
    } catch (error) {
      console.error(`[collector] Failed to fetch pod status for ${podName}:`, error);
      return `Error fetching pod status: ${errorMessage(error)}`;
    }
  }

  async fetchEvents(namespace: string, podName: string): Promise<string> {
    try {
      const events = await this.options.cluster.getEvents(namespace, podName);
      console.log(`[collector] Gathered ${events.length} events for ${podName}`);
      return formatEvents(events);
    } catch (error) {
      console.error(`[collector] Failed to fetch events for ${podName}:`, error);
      return `Error fetching events: ${errorMessage(error)}`;
    }
  }

  async fetchMetrics(namespace: string, podName: string): Promise<string> {
    try {
      return await this.options.metrics.summarize(namespace, podName);
    } catch (error) {
      console.error(`[collector] Failed to summarize metrics for ${podName}:`, error);
      return `Error fetching detailed metrics: ${errorMessage(error)}`;
    }
  }

  async fetchLogs(namespace: string, podName: string): Promise<string> {
    try {
      let logs = await this.options.cluster.getLogs(namespace, podName, this.logTailLines, false);
      if (!logs.trim()) {
        console.log(`[collector] Current logs empty, fetching previous container logs for ${podName}`);
        logs = await this.options.cluster.getLogs(namespace, podName, this.logTailLines, true);
      }
      return logs ? logs : NO_LOGS_MESSAGE;
    } catch (error) {
      console.error(`[collector] Failed to fetch logs for ${podName}:`, error);
      return `Error fetching logs: ${errorMessage(error)}`;
    }
  }

  async fetchProfiling(podName: string): Promise<string> {
    if (!this.options.profilingEnabled) {
      return PROFILING_DISABLED_MESSAGE;
    }

    try {
      const report = await this.options.profiling.getReport(podName);
      console.log(`[collector] Gathered JFR report (length: ${report.length})`);
      return report;
    } catch (error) {
      console.error(`[collector] Failed to fetch JFR report for ${podName}:`, error);
      return `Error fetching JFR analysis: ${errorMessage(error)}`;
    }
  }

  async collect(namespace: string, podName: string): Promise<DiagnosticContext> {
    console.log(`[collector] Collecting diagnostic context for ${namespace}/${podName}`);

    const podStatusText = await this.fetchPodStatus(namespace, podName);
    const eventsText = await this.fetchEvents(namespace, podName);
    const metricsText = await this.fetchMetrics(namespace, podName);
    const logsText = await this.fetchLogs(namespace, podName);
    const profilingText = await this.fetchProfiling(podName);

    return createDiagnosticContext({
      podStatusText,
      eventsText,
      metricsText,
      logsText,
      profilingText,
    });
  }
}
