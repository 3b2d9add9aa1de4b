import { beforeEach, describe, expect, it, vi } from "vitest";
import type { DiagnosticContext, RcaPipelineState, RcaReport } from "@shared/rca";
import type { ReasoningCapabilities } from "../../agent/reasoning";
import { createDiagnosticContext } from "../dataCollector";
import {
  RcaPipeline,
  healthyReport,
  isHealthyToken,
  sanitizeAnomalyToken,
} from "../rca";

const context: DiagnosticContext = createDiagnosticContext({
  podStatusText: "Phase: Running\n",
  eventsText: "No events found for this pod.",
  metricsText: "--- DETAILED RESOURCE METRICS ---\n",
  logsText: "java.lang.OutOfMemoryError",
  profilingText: "JFR Analysis is disabled.",
});

const validatedReport: RcaReport = {
  title: "OOM Killed",
  issue: "Heap exceeded the limit",
  evidence: "Memory at 100%",
  supportedLogs: ["java.lang.OutOfMemoryError"],
  proposedSolution: "Raise the memory limit",
  validationConfidence: 0.87,
};

function createHarness(classification: string) {
  const collect = vi.fn(async () => context);
  const classify = vi.fn(async () => classification);
  const explainRootCause = vi.fn(async () => "The JVM heap grew past the container limit.");
  const validateAndFormat = vi.fn(async () => validatedReport);
  const reasoning: ReasoningCapabilities = { classify, explainRootCause, validateAndFormat };
  const states: RcaPipelineState[] = [];

  const pipeline = new RcaPipeline({
    collector: { collect },
    reasoning,
    onTransition: (state) => states.push(state),
  });

  return { pipeline, collect, classify, explainRootCause, validateAndFormat, states };
}

describe("sanitizeAnomalyToken", () => {
  it("keeps the first line without comments", () => {
    expect(sanitizeAnomalyToken("OOM_KILLED # memory\nmore text")).toBe("OOM_KILLED");
    expect(sanitizeAnomalyToken("  CPU_THROTTLING  ")).toBe("CPU_THROTTLING");
    expect(sanitizeAnomalyToken("# only a comment")).toBe("");
    expect(sanitizeAnomalyToken("")).toBe("");
    expect(sanitizeAnomalyToken("HEALTHY\n# note")).toBe("HEALTHY");
  });

  it("stops at carriage returns", () => {
    expect(sanitizeAnomalyToken("OOM_KILLED\rThe container was killed")).toBe("OOM_KILLED");
    expect(sanitizeAnomalyToken("CRASH_LOOP\r\nrestarting")).toBe("CRASH_LOOP");
  });
});

describe("isHealthyToken", () => {
  it("treats blank and HEALTHY variants as healthy", () => {
    expect(isHealthyToken("")).toBe(true);
    expect(isHealthyToken("HEALTHY")).toBe(true);
    expect(isHealthyToken("healthy")).toBe(true);
    expect(isHealthyToken("UNHEALTHY")).toBe(true);
    expect(isHealthyToken("OOM_KILLED")).toBe(false);
  });
});

describe("RcaPipeline", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("short-circuits a healthy pod without analysis or validation", async () => {
    const harness = createHarness("HEALTHY\nAll metrics nominal");

    const report = await harness.pipeline.runAnalysis("default", "api-1");

    expect(report).toEqual({
      title: "System Healthy",
      issue: "No anomaly detected",
      evidence: "Metrics within normal range",
      supportedLogs: [],
      proposedSolution: "No action needed",
      validationConfidence: 1.0,
    });
    expect(harness.explainRootCause).not.toHaveBeenCalled();
    expect(harness.validateAndFormat).not.toHaveBeenCalled();
    expect(harness.states).toEqual(["COLLECTING", "DETECTING", "HEALTHY_SHORT_CIRCUIT", "DONE"]);
  });

  it("treats an empty classification as healthy", async () => {
    const harness = createHarness("   ");
    await expect(harness.pipeline.runAnalysis("default", "api-1")).resolves.toEqual(healthyReport());
    expect(harness.explainRootCause).not.toHaveBeenCalled();
  });

  it("returns an independent healthy report for every run", async () => {
    const harness = createHarness("HEALTHY");

    const first = await harness.pipeline.runAnalysis("default", "api-1");
    first.supportedLogs?.push("added by the first caller");
    const second = await harness.pipeline.runAnalysis("default", "api-2");

    expect(second).not.toBe(first);
    expect(second.supportedLogs).toEqual([]);
    expect(Object.isFrozen(second)).toBe(true);
  });

  it("passes a token cut at a carriage return to the analyst", async () => {
    const harness = createHarness("OOM_KILLED\rThe container was killed");

    await harness.pipeline.runAnalysis("default", "api-1");

    expect(harness.explainRootCause).toHaveBeenCalledWith("OOM_KILLED", context.fullContext);
  });

  it("runs analysis and validation on the full context", async () => {
    const harness = createHarness("OOM_KILLED # heap\nexplanation");

    const report = await harness.pipeline.runAnalysis("payments", "checkout-7d9f");

    expect(harness.collect).toHaveBeenCalledWith("payments", "checkout-7d9f");
    expect(harness.classify).toHaveBeenCalledWith(context.fullContext);
    expect(harness.explainRootCause).toHaveBeenCalledWith("OOM_KILLED", context.fullContext);
    expect(harness.validateAndFormat).toHaveBeenCalledWith(
      "The JVM heap grew past the container limit.",
      context.fullContext,
    );
    expect(report).toBe(validatedReport);
    expect(harness.states).toEqual(["COLLECTING", "DETECTING", "ANALYZING", "VALIDATING", "DONE"]);
  });

  it("propagates stage failures without retrying", async () => {
    const harness = createHarness("CRASH_LOOP");
    harness.explainRootCause.mockRejectedValueOnce(new Error("provider unavailable"));

    await expect(harness.pipeline.runAnalysis("default", "api-1")).rejects.toThrow(
      "provider unavailable",
    );
    expect(harness.explainRootCause).toHaveBeenCalledTimes(1);
    expect(harness.validateAndFormat).not.toHaveBeenCalled();
    expect(harness.states).toEqual(["COLLECTING", "DETECTING", "ANALYZING"]);
  });
});
