import { FINDING_TAG } from '../../domain/finding';
import type { TaggedFinding } from '../../domain/finding';
import type { Report } from '../../domain/report';
import { summarizeSnapshot } from '../../domain/run-snapshot';
import type { RunSnapshot, TargetResult } from '../../domain/run-snapshot';
import { SEVERITY_ORDER } from '../../domain/severity';
import { targetLabel } from '../../domain/target';

export type ReportSettings = {
  recipients: readonly string[];
  subject: string;
};

const INDENT = '    ';
const DETAIL_INDENT = '            ';
const SUMMARY_LIMIT = 160;

// First paragraph of the advisory text, on one line
const summarize = (description: string): string => {
  const paragraph = (description.trim().split(/\n\s*\n/)[0] ?? '').replace(/\s+/g, ' ');
  return paragraph.length > SUMMARY_LIMIT ? `${paragraph.slice(0, SUMMARY_LIMIT - 3).trimEnd()}...` : paragraph;
};

const compareText = (left: string, right: string): number => {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
};

const subjectPrefix = (snapshot: RunSnapshot): string => {
  const totals = summarizeSnapshot(snapshot);
  if (totals.failed > 0) {
    return '[AUDIT FAILED] ';
  }
  if (totals.newFindings > 0) {
    return '[NEW VULNERABILITIES] ';
  }
  if (totals.knownFindings > 0) {
    return '[VULNERABILITIES FOUND] ';
  }
  return '';
};

const renderFinding = (finding: TaggedFinding): string[] => {
  const marker = finding.tag === FINDING_TAG.NEW ? '[NEW]  ' : '[known]';
  const version = finding.packageVersion ? ` ${finding.packageVersion}` : '';
  const kind = finding.warningKind ? ` (${finding.warningKind})` : '';
  const lines = [`${INDENT}${marker} ${finding.advisoryId}  ${finding.packageName}${version}${kind}`];

  if (finding.title) {
    lines.push(`${DETAIL_INDENT}${finding.title}`);
  }
  const summary = summarize(finding.description);
  if (summary) {
    lines.push(`${DETAIL_INDENT}${summary}`);
  }
  if (finding.patchedVersions.length > 0) {
    lines.push(`${DETAIL_INDENT}patched: ${finding.patchedVersions.join(', ')}`);
  }
  if (finding.aliases.length > 0) {
    lines.push(`${DETAIL_INDENT}aliases: ${finding.aliases.join(', ')}`);
  }
  if (finding.url) {
    lines.push(`${DETAIL_INDENT}${finding.url}`);
  }
  return lines;
};

const renderTarget = (result: Extract<TargetResult, { status: 'ok' }>): string[] => {
  const lines = [targetLabel(result.target)];

  if (result.findings.length === 0) {
    lines.push('  No known vulnerabilities.');
  }

  for (const severity of SEVERITY_ORDER) {
    const findings = result.findings
      .filter((finding) => finding.severity === severity)
      .sort((left, right) => {
        if (left.tag !== right.tag) {
          return left.tag === FINDING_TAG.NEW ? -1 : 1;
        }
        return compareText(left.advisoryId, right.advisoryId);
      });
    if (findings.length === 0) {
      continue;
    }
    lines.push(`  ${severity.toUpperCase()}`);
    for (const finding of findings) {
      lines.push(...renderFinding(finding));
    }
  }

  if (result.resolved.length > 0) {
    lines.push('  RESOLVED SINCE LAST RUN');
    for (const advisoryId of result.resolved) {
      lines.push(`${INDENT}[resolved] ${advisoryId}`);
    }
  }

  return lines;
};

/**
 * Render a snapshot as a plain-text report. Output depends only on the
 * snapshot and settings, so a retried send carries identical content.
 */
export const composeReport = (snapshot: RunSnapshot, settings: ReportSettings): Report => {
  const totals = summarizeSnapshot(snapshot);
  const lines = [
    `Audit run ${snapshot.generatedAt}`,
    `Targets: ${totals.targets} audited, ${totals.failed} failed`,
    `Findings: ${totals.newFindings} new, ${totals.knownFindings} known, ${totals.resolvedFindings} resolved`,
  ];

  const failures = snapshot.results.filter(
    (result): result is Extract<TargetResult, { status: 'failed' }> => result.status === 'failed',
  );
  if (failures.length > 0) {
    lines.push('', 'FAILED AUDITS');
    for (const result of failures) {
      lines.push(`  ${targetLabel(result.target)}`, `${INDENT}${result.failure.kind}: ${result.failure.detail}`);
    }
  }

  for (const result of snapshot.results) {
    if (result.status === 'ok') {
      lines.push('', ...renderTarget(result));
    }
  }

  return {
    recipients: [...settings.recipients],
    subject: `${subjectPrefix(snapshot)}${settings.subject}`,
    body: `${lines.join('\n')}\n`,
    snapshot,
  };
};
