import { RequestHandler, Response } from "express";
import type { RcaErrorResponse, RcaScanResponse } from "@shared/rca";
import { loadConfig } from "../config";
import { renderReport } from "../services/reportRenderer";
import { getRcaPipeline } from "../services/rca";
import { getWorkloadScanner } from "../services/scanner";

const DNS_1123_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;
const DNS_1123_SUBDOMAIN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?(\.[a-z0-9]([-a-z0-9]*[a-z0-9])?)*$/;
const SELECTOR_TERM = "[A-Za-z0-9][A-Za-z0-9._/-]*(?:!?=|==)?[A-Za-z0-9._-]*";
// Equality-based selectors only: `key`, `key=value`, `key!=value`, comma separated.
const LABEL_SELECTOR = new RegExp(`^${SELECTOR_TERM}(?:,${SELECTOR_TERM})*$`);

function sendError(res: Response, status: number, code: string, message: string) {
  const payload: RcaErrorResponse = { error: { code, message } };
  return res.status(status).json(payload);
}

function readString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

export function isValidNamespace(namespace: string): boolean {
  return namespace.length <= 63 && DNS_1123_LABEL.test(namespace);
}

export function isValidPodName(pod: string): boolean {
  return pod.length <= 253 && DNS_1123_SUBDOMAIN.test(pod);
}

export function isValidLabelSelector(selector: string): boolean {
  return LABEL_SELECTOR.test(selector);
}

export const handleAnalyze: RequestHandler = async (req, res) => {
  const namespace = readString(req.query.namespace) || "default";
  const pod = readString(req.query.pod);
  const format = readString(req.query.format) || "json";

  if (!pod || !isValidPodName(pod) || !isValidNamespace(namespace)) {
    return sendError(
      res,
      400,
      "RCA_INVALID_REQUEST",
      "pod is required and pod/namespace must be valid Kubernetes names",
    );
  }

  if (format !== "json" && format !== "text") {
    return sendError(res, 400, "RCA_INVALID_REQUEST", `Unsupported format: ${format}`);
  }

  try {
    const report = await getRcaPipeline().runAnalysis(namespace, pod);

    if (format === "text") {
      return res.type("text/plain").send(renderReport(report));
    }
    return res.json(report);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Failed to analyze pod";
    return sendError(res, 500, "RCA_ANALYZE_ERROR", message);
  }
};

export const handleScan: RequestHandler = async (req, res) => {
  const body: unknown = req.body;
  const requested =
    typeof body === "object" && body !== null && "label" in body ? readString(body.label) : "";
  const label = requested || loadConfig().scan.label;

  if (!isValidLabelSelector(label)) {
    return sendError(res, 400, "RCA_INVALID_REQUEST", `Invalid label selector: ${label}`);
  }

  try {
    const results = await getWorkloadScanner().scan(label);
    const payload: RcaScanResponse = { label, results };
    return res.json(payload);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Failed to scan workloads";
    return sendError(res, 500, "RCA_SCAN_ERROR", message);
  }
};
