import type { AuditFailure } from './audit-outcome';
import type { TaggedFinding } from './finding';
import type { Target } from './target';

export type TargetResult =
  | {
      status: 'ok';
      target: Target;
      findings: TaggedFinding[];
      /** Advisory ids seen on the previous successful run but not on this one. */
      resolved: string[];
    }
  | {
      status: 'failed';
      target: Target;
      failure: AuditFailure;
    };

export type RunSnapshot = {
  generatedAt: string;
  /** One entry per target, in configuration order. */
  results: TargetResult[];
};

export type RunTotals = {
  targets: number;
  failed: number;
  newFindings: number;
  knownFindings: number;
  resolvedFindings: number;
};

export const summarizeSnapshot = (snapshot: RunSnapshot): RunTotals => {
  const totals: RunTotals = {
    targets: snapshot.results.length,
    failed: 0,
    newFindings: 0,
    knownFindings: 0,
    resolvedFindings: 0,
  };

  for (const result of snapshot.results) {
    if (result.status === 'failed') {
      totals.failed += 1;
      continue;
    }
    for (const finding of result.findings) {
      if (finding.tag === 'new') {
        totals.newFindings += 1;
      } else {
        totals.knownFindings += 1;
      }
    }
    totals.resolvedFindings += result.resolved.length;
  }

  return totals;
};

/** A clean run has nothing new to alert on and no failed targets. */
export const isCleanRun = (snapshot: RunSnapshot): boolean => {
  const totals = summarizeSnapshot(snapshot);
  return totals.newFindings === 0 && totals.failed === 0;
};
