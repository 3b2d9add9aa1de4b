import type { DiagnosticContext, RcaPipelineState, RcaReport } from "@shared/rca";
import { loadConfig } from "../config";
import { createConfiguredProviders } from "../agent/providers";
import { LlmReasoning, ReasoningCapabilities } from "../agent/reasoning";
import { CryostatClient } from "./cryostat";
import { DataCollector } from "./dataCollector";
import { KubectlClusterInfo } from "./k8s";
import { MetricsSummarizer } from "./metricsSummary";
import { PrometheusClient } from "./prometheus";
import { TokenProvider } from "./tokenProvider";

export const HEALTHY_TOKEN = "HEALTHY";

/**
 * Canned report for a healthy pod. Each call returns a new object that the
 * caller owns.
 */
export function healthyReport(): RcaReport {
  return Object.freeze({
    title: "System Healthy",
    issue: "No anomaly detected",
    evidence: "Metrics within normal range",
    supportedLogs: [],
    proposedSolution: "No action needed",
    validationConfidence: 1.0,
  });
}

/**
 * First line of the detector output, without any `#` comment, trimmed.
 */
export function sanitizeAnomalyToken(raw: string): string {
  return raw.split(/\r\n|\r|\n/)[0].split("#")[0].trim();
}

/**
 * Blank output and anything mentioning HEALTHY count as healthy.
 */
export function isHealthyToken(token: string): boolean {
  if (!token) return true;
  return token.toUpperCase().includes(HEALTHY_TOKEN);
}

export interface ContextSource {
  collect(namespace: string, podName: string): Promise<DiagnosticContext>;
}

export interface RcaPipelineOptions {
  collector: ContextSource;
  reasoning: ReasoningCapabilities;
  onTransition?: (state: RcaPipelineState, target: string) => void;
}

/**
 * collect -> detect -> analyze -> validate, stopping after detection when
 * the pod looks healthy. Stage errors propagate to the caller unchanged.
 */
export class RcaPipeline {
  constructor(private readonly options: RcaPipelineOptions) {}

  private enter(state: RcaPipelineState, target: string): void {
    this.options.onTransition?.(state, target);
  }

  async runAnalysis(namespace: string, podName: string): Promise<RcaReport> {
    const target = `${namespace}/${podName}`;
    console.log(`[rca] Starting analysis for ${target}`);

    this.enter("COLLECTING", target);
    const context = await this.options.collector.collect(namespace, podName);
    console.debug(`[rca] Full context for ${target}:\n${context.fullContext}`);

    this.enter("DETECTING", target);
    const rawToken = await this.options.reasoning.classify(context.fullContext);
    const anomalyToken = sanitizeAnomalyToken(rawToken);
    console.log(`[rca] Detected anomaly for ${target}: ${anomalyToken || "(none)"}`);

    if (isHealthyToken(anomalyToken)) {
      this.enter("HEALTHY_SHORT_CIRCUIT", target);
      this.enter("DONE", target);
      return healthyReport();
    }

    this.enter("ANALYZING", target);
    const explanation = await this.options.reasoning.explainRootCause(
      anomalyToken,
      context.fullContext,
    );

    this.enter("VALIDATING", target);
    const report = await this.options.reasoning.validateAndFormat(
      explanation,
      context.fullContext,
    );

    this.enter("DONE", target);
    console.log(`[rca] Analysis complete for ${target}: ${report.title}`);
    return report;
  }
}

export function createRcaPipeline(): RcaPipeline {
  const config = loadConfig();
  const tokenProvider = new TokenProvider(config.tokenPath);
  const cluster = new KubectlClusterInfo();

  const metrics = new MetricsSummarizer(
    cluster,
    new PrometheusClient({ ...config.prometheus, tokenProvider }),
  );
  const profiling = new CryostatClient({
    baseUrl: config.cryostat.baseUrl,
    timeoutMs: config.cryostat.timeoutMs,
    tokenProvider,
  });

  const providers = createConfiguredProviders();
  if (providers.size === 0) {
    console.warn(
      "⚠ No LLM providers configured. Set ANTHROPIC_API_KEY, OPENAI_API_KEY, or GOOGLE_API_KEY to enable analysis.",
    );
  } else {
    for (const [id, provider] of providers) {
      console.log(`✓ Registered provider: ${provider.name} (${id})`);
    }
  }

  return new RcaPipeline({
    collector: new DataCollector({
      cluster,
      metrics,
      profiling,
      profilingEnabled: config.cryostat.enabled,
      logTailLines: config.logTailLines,
    }),
    reasoning: new LlmReasoning(providers, config.stages),
  });
}

let rcaPipeline: RcaPipeline | null = null;

export function getRcaPipeline(): RcaPipeline {
  if (!rcaPipeline) {
    rcaPipeline = createRcaPipeline();
  }
  return rcaPipeline;
}
