import type { ClusterInfo } from "./k8s";
import type { MetricsBackend, PrometheusQueryResponse } from "./prometheus";

const BYTES_PER_MB = 1024 * 1024;

function podSelector(namespace: string, target: string): string {
  return `pod="${target}", namespace="${namespace}", container!="", image!=""`;
}

export function buildMetricQueries(namespace: string, target: string) {
  const selector = podSelector(namespace, target);
  return {
    memoryUsage: `sum(container_memory_usage_bytes{${selector}})`,
    memoryLimit: `sum(container_spec_memory_limit_bytes{${selector}})`,
    cpuUsage: `sum(rate(container_cpu_usage_seconds_total{${selector}}[5m]))`,
    cpuLimit: `sum(container_spec_cpu_quota{${selector}}) / sum(container_spec_cpu_period{${selector}})`,
    jvmHeapUsage: `sum(jvm_memory_used_bytes{pod="${target}", namespace="${namespace}", area="heap"})`,
  };
}

/**
 * Latest sample value of the first series, or 0 when there is none.
 * Never throws: unreadable payloads are logged and read as 0.
 */
export function extractValue(result: PrometheusQueryResponse | null | undefined): number {
  try {
    const series = result?.data?.result;
    if (!Array.isArray(series) || series.length === 0) return 0;

    const first = series[0];
    const sample = first.value ?? first.values?.[first.values.length - 1];
    if (!sample) return 0;

    const value = Number(sample[1]);
    if (!Number.isFinite(value)) {
      console.warn(`[metrics] Non-numeric sample value: ${String(sample[1])}`);
      return 0;
    }
    return value;
  } catch (error) {
    console.warn("[metrics] Could not extract value from Prometheus response:", error);
    return 0;
  }
}

/**
 * `{cpu: "500m", memory: "512Mi"}` -> `[cpu=500m, memory=512Mi]`
 */
export function formatResourceList(resources: Record<string, string> | undefined): string {
  if (!resources) return "N/A";
  const entries = Object.entries(resources).map(([key, value]) => `${key}=${value}`);
  return `[${entries.join(", ")}]`;
}

function percentOf(usage: number, limit: number): number {
  return limit > 0 ? (usage / limit) * 100 : 0;
}

export class MetricsSummarizer {
  constructor(
    private readonly cluster: Pick<ClusterInfo, "getPodSpec">,
    private readonly metrics: MetricsBackend,
  ) {}

  async summarize(namespace: string, target: string): Promise<string> {
    console.log(`[metrics] Fetching detailed metrics for ${namespace}/${target}`);

    try {
      const spec = await this.cluster.getPodSpec(namespace, target);
      const limits = formatResourceList(spec?.limits);
      const requests = formatResourceList(spec?.requests);

      const queries = buildMetricQueries(namespace, target);
      let memoryUsage = extractValue(await this.metrics.query(queries.memoryUsage));
      const memoryLimit = extractValue(await this.metrics.query(queries.memoryLimit));
      const cpuUsage = extractValue(await this.metrics.query(queries.cpuUsage));
      const cpuLimit = extractValue(await this.metrics.query(queries.cpuLimit));

      if (memoryUsage === 0) {
        console.log("[metrics] Container memory usage is 0, trying JVM heap fallback");
        memoryUsage = extractValue(await this.metrics.query(queries.jvmHeapUsage));
      }

      const memoryPercent = percentOf(memoryUsage, memoryLimit);
      const cpuPercent = percentOf(cpuUsage, cpuLimit);

      return [
        "--- DETAILED RESOURCE METRICS ---",
        `TARGET: ${namespace}/${target}`,
        "",
        "K8S RESOURCE CONFIG:",
        `  Limits:   ${limits}`,
        `  Requests: ${requests}`,
        "",
        "PROMETHEUS REAL-TIME DATA:",
        `  Memory Usage: ${(memoryUsage / BYTES_PER_MB).toFixed(2)} MB (${memoryPercent.toFixed(2)}% of limit)`,
        `  Memory Limit: ${(memoryLimit / BYTES_PER_MB).toFixed(2)} MB`,
        `  CPU Usage:    ${cpuUsage.toFixed(3)} Cores (${cpuPercent.toFixed(2)}% of limit)`,
        `  CPU Limit:    ${cpuLimit.toFixed(3)} Cores`,
        "---",
        "",
      ].join("\n");
    } catch (error) {
      console.error(`[metrics] Metric collection failed for ${namespace}/${target}:`, error);
      return `Error fetching detailed metrics: ${error instanceof Error ? error.message : String(error)}`;
    }
  }
}
