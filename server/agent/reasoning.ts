import type { RcaReport } from "@shared/rca";
import {
  AgentError,
  LLMProvider,
  ModelPreferences,
  ReasoningStage,
} from "@shared/coordination";
import type { StageModelConfig } from "../config";

/**
 * The three opaque reasoning steps of an RCA run.
 */
export interface ReasoningCapabilities {
  /** Raw, unsanitized anomaly classification of the full context. */
  classify(context: string): Promise<string>;
  explainRootCause(anomalyToken: string, context: string): Promise<string>;
  validateAndFormat(rcaText: string, context: string): Promise<RcaReport>;
}

const DETECTOR_SYSTEM_PROMPT = [
  "You are an anomaly detection model for Kubernetes workloads.",
  "Analyze the METRICS and POD STATUS sections of the context.",
  "Output ONLY the anomaly type (for example OOM_KILLED, CPU_THROTTLING, CRASH_LOOP) or HEALTHY.",
].join(" ");

function analystPrompt(anomalyToken: string, fullContext: string): string {
  return [
    "You are the Root Cause Analyst. Use all of the provided context to give a detailed, reasoned root cause analysis and a proposed fix.",
    "Give JFR profiling data heavy weight when it is present.",
    "",
    `ANOMALY TYPE: ${anomalyToken}`,
    `FULL CONTEXT: ${fullContext}`,
    "",
    "Determine the root cause and propose a solution. Output only the detailed analysis and fix.",
  ].join("\n");
}

function validatorPrompt(rcaOutput: string, fullContext: string): string {
  return [
    "You are the Validation Agent. Critique the RCA output below and format it as a JSON object.",
    "",
    "Return a JSON object with exactly these fields:",
    '{"title":"short summary, e.g. OOM Killed - Memory Limit Exceeded","issue":"what went wrong and why","evidence":"metrics, observations and data points supporting the diagnosis","supportedLogs":["relevant log lines or patterns"],"proposedSolution":"concrete, actionable steps","validationConfidence":0.0}',
    "",
    "Rules:",
    "- take the issue description from the RCA output",
    "- include specific metric values in evidence",
    "- validationConfidence is between 0.0 and 1.0",
    "- infer any field the RCA output is missing from the original context",
    "",
    "RCA Output to Validate:",
    rcaOutput,
    "",
    "Original Context:",
    fullContext,
    "",
    "Return ONLY the JSON object, no other text.",
  ].join("\n");
}

function sanitizeJsonCandidate(candidate: string): string {
  return candidate
    .trim()
    .replace(/^\uFEFF/, "")
    .replace(/[“”]/g, '"')
    .replace(/[‘’]/g, "'")
    .replace(/,\s*([}\]])/g, "$1");
}

function extractJsonObjectCandidates(raw: string): string[] {
  const candidates: string[] = [];
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < raw.length; i += 1) {
    const ch = raw[i];

    if (escaped) {
      escaped = false;
      continue;
    }

    if (ch === "\\") {
      escaped = true;
      continue;
    }

    if (ch === '"') {
      inString = !inString;
      continue;
    }

    if (inString) continue;

    if (ch === "{") {
      if (depth === 0) start = i;
      depth += 1;
      continue;
    }

    if (ch === "}") {
      depth = Math.max(0, depth - 1);
      if (depth === 0 && start >= 0) {
        candidates.push(raw.slice(start, i + 1));
        start = -1;
      }
    }
  }

  return candidates;
}

function asText(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (value === null || value === undefined) return "";
  return JSON.stringify(value);
}

function asLogs(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.map((entry) => asText(entry)).filter((entry) => entry.length > 0);
  }
  const single = asText(value);
  return single ? [single] : [];
}

/**
 * Confidence in [0, 1]. Percent-style values (e.g. 85) are scaled down.
 */
export function normalizeConfidence(value: unknown): number | undefined {
  const parsed = typeof value === "string" ? Number(value.replace("%", "").trim()) : value;
  if (typeof parsed !== "number" || !Number.isFinite(parsed)) return undefined;
  const scaled = parsed > 1 && parsed <= 100 ? parsed / 100 : parsed;
  return Math.max(0, Math.min(1, scaled));
}

function toReport(parsed: unknown): RcaReport | null {
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return null;
  const record: Record<string, unknown> = { ...parsed };

  const title = asText(record.title);
  const issue = asText(record.issue);
  if (!title && !issue) return null;

  return {
    title,
    issue,
    evidence: asText(record.evidence),
    supportedLogs: asLogs(record.supportedLogs),
    proposedSolution: asText(record.proposedSolution),
    validationConfidence: normalizeConfidence(record.validationConfidence),
  };
}

/**
 * Pulls the report object out of validator output: bare JSON, a ```json
 * fence, or the first balanced object embedded in prose.
 */
export function parseRcaReport(raw: string): RcaReport {
  const candidates: string[] = [];
  const codeBlockMatch = raw.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (codeBlockMatch?.[1]) {
    candidates.push(codeBlockMatch[1].trim());
  }

  candidates.push(raw.trim());
  candidates.push(...extractJsonObjectCandidates(raw));

  for (const candidate of candidates) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(sanitizeJsonCandidate(candidate));
    } catch {
      continue;
    }

    const report = toReport(parsed);
    if (report) return Object.freeze(report);
  }

  throw new AgentError(
    "RCA_REPORT_MALFORMED",
    "Validator output did not contain an RCA report JSON object",
    false,
  );
}

/**
 * Reasoning capabilities backed by configured LLM providers. Each stage may
 * pin its own provider and model; unpinned stages use the configured
 * provider with the best priority.
 */
export class LlmReasoning implements ReasoningCapabilities {
  constructor(
    private readonly providers: Map<string, LLMProvider>,
    private readonly stages: Record<ReasoningStage, StageModelConfig>,
  ) {}

  private resolveProvider(stage: ReasoningStage): LLMProvider {
    const pinned = this.stages[stage].providerId;
    if (pinned) {
      const provider = this.providers.get(pinned);
      if (!provider) {
        throw new AgentError(
          "PROVIDER_NOT_CONFIGURED",
          `Provider "${pinned}" configured for the ${stage} stage is not available`,
          false,
        );
      }
      return provider;
    }

    const [best] = Array.from(this.providers.values()).sort(
      (a, b) => (a.priority ?? Number.MAX_SAFE_INTEGER) - (b.priority ?? Number.MAX_SAFE_INTEGER),
    );
    if (!best) {
      throw new AgentError("NO_PROVIDER", "No LLM providers configured", false);
    }
    return best;
  }

  private async ask(
    stage: ReasoningStage,
    prompt: string,
    options: { systemPrompt?: string; maxTokens: number; temperature: number },
  ): Promise<string> {
    const provider = this.resolveProvider(stage);
    const modelPreferences: ModelPreferences = {
      providerId: provider.id,
      model: this.stages[stage].model,
      maxTokens: options.maxTokens,
      temperature: options.temperature,
    };

    return provider.complete({
      systemPrompt: options.systemPrompt,
      messages: [{ role: "user", content: prompt, timestamp: Date.now() }],
      modelPreferences,
    });
  }

  classify(context: string): Promise<string> {
    return this.ask("detector", context, {
      systemPrompt: DETECTOR_SYSTEM_PROMPT,
      maxTokens: 64,
      temperature: 0,
    });
  }

  explainRootCause(anomalyToken: string, context: string): Promise<string> {
    return this.ask("analyst", analystPrompt(anomalyToken, context), {
      maxTokens: 4096,
      temperature: 0.2,
    });
  }

  async validateAndFormat(rcaText: string, context: string): Promise<RcaReport> {
    const raw = await this.ask("validator", validatorPrompt(rcaText, context), {
      maxTokens: 2048,
      temperature: 0.1,
    });
    return parseRcaReport(raw);
  }
}
