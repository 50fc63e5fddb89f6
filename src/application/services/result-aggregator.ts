import type { AuditOutcome } from '../../domain/audit-outcome';
import { FINDING_TAG } from '../../domain/finding';
import type { TaggedFinding } from '../../domain/finding';
import type { History } from '../../domain/history';
import type { RunSnapshot, TargetResult } from '../../domain/run-snapshot';

const aggregateOutcome = (outcome: AuditOutcome, history: History): TargetResult => {
  if (outcome.status === 'failed') {
    return { status: 'failed', target: outcome.target, failure: outcome.failure };
  }

  const previous = new Set(history.get(outcome.target.path)?.advisories ?? []);
  const current = new Set<string>();
  const findings: TaggedFinding[] = [];

  for (const finding of outcome.findings) {
    // Identity is (target, advisory id); repeated ids within one outcome are the same finding
    if (current.has(finding.advisoryId)) {
      continue;
    }
    current.add(finding.advisoryId);
    findings.push({
      ...finding,
      tag: previous.has(finding.advisoryId) ? FINDING_TAG.KNOWN : FINDING_TAG.NEW,
    });
  }

  const resolved = [...previous].filter((advisoryId) => !current.has(advisoryId)).sort();

  return { status: 'ok', target: outcome.target, findings, resolved };
};

/**
 * Compare each target's findings against its history. Pure: history is only
 * read, and failed targets carry no findings so nothing is marked resolved.
 */
export const aggregate = (
  outcomes: readonly AuditOutcome[],
  history: History,
  generatedAt: Date,
): RunSnapshot => ({
  generatedAt: generatedAt.toISOString(),
  results: outcomes.map((outcome) => aggregateOutcome(outcome, history)),
});
