import type { ScanResult } from "@shared/rca";
import { loadConfig } from "../config";
import { KubectlClusterInfo, type ClusterInfo, type PodRef } from "./k8s";
import { getRcaPipeline, type RcaPipeline } from "./rca";

export interface WorkloadScannerOptions {
  cluster: Pick<ClusterInfo, "listPodsByLabel">;
  pipeline: Pick<RcaPipeline, "runAnalysis">;
  concurrency?: number;
}

/**
 * Runs an analysis for every pod matching a label selector. A failing pod
 * produces a `failed` result; the others still run.
 */
export class WorkloadScanner {
  private readonly concurrency: number;

  constructor(private readonly options: WorkloadScannerOptions) {
    this.concurrency = Math.max(1, options.concurrency ?? 1);
  }

  private async analyzeTarget(target: PodRef): Promise<ScanResult> {
    const ref = { namespace: target.namespace, pod: target.name };
    try {
      const report = await this.options.pipeline.runAnalysis(target.namespace, target.name);
      console.log(`[scanner] ${target.namespace}/${target.name} Decision: ${report.issue}`);
      return { ...ref, status: "ok", report };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[scanner] Analysis failed for ${target.namespace}/${target.name}:`, error);
      return { ...ref, status: "failed", error: message };
    }
  }

  async scan(labelSelector: string): Promise<ScanResult[]> {
    const targets = await this.options.cluster.listPodsByLabel(labelSelector);
    console.log(`[scanner] Found ${targets.length} target(s) for label ${labelSelector}`);

    const results: ScanResult[] = new Array(targets.length);
    let next = 0;

    const worker = async () => {
      while (next < targets.length) {
        const index = next;
        next += 1;
        results[index] = await this.analyzeTarget(targets[index]);
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, targets.length) }, () =>
      worker(),
    );
    await Promise.all(workers);

    return results;
  }
}

let workloadScanner: WorkloadScanner | null = null;

export function getWorkloadScanner(): WorkloadScanner {
  if (!workloadScanner) {
    workloadScanner = new WorkloadScanner({
      cluster: new KubectlClusterInfo(),
      pipeline: getRcaPipeline(),
      concurrency: loadConfig().scan.concurrency,
    });
  }
  return workloadScanner;
}
