export interface RcaTargetRef {
  namespace: string;
  pod: string;
}

export interface RcaReport {
  title: string;
  issue: string;
  evidence: string;
  supportedLogs?: string[];
  proposedSolution: string;
  validationConfidence?: number;
}

/**
 * Everything collected about one pod for a single analysis run.
 * `fullContext` is always produced by `buildFullContext` from the other five
 * sections.
 */
export interface DiagnosticContext {
  readonly podStatusText: string;
  readonly eventsText: string;
  readonly metricsText: string;
  readonly logsText: string;
  readonly profilingText: string;
  readonly fullContext: string;
}

export type RcaPipelineState =
  | "COLLECTING"
  | "DETECTING"
  | "HEALTHY_SHORT_CIRCUIT"
  | "ANALYZING"
  | "VALIDATING"
  | "DONE";

export type ScanResult =
  | (RcaTargetRef & { status: "ok"; report: RcaReport })
  | (RcaTargetRef & { status: "failed"; error: string });

export interface RcaScanResponse {
  label: string;
  results: ScanResult[];
}

export interface RcaErrorResponse {
  error: {
    code: string;
    message: string;
  };
}
