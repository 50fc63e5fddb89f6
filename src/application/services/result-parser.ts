import { z } from 'zod';

import { cvssBaseScore } from '../../domain/cvss';
import type { Finding } from '../../domain/finding';
import { SEVERITY, severityFromScore } from '../../domain/severity';
import type { Severity } from '../../domain/severity';

const advisorySchema = z.object({
  id: z.string().min(1),
  package: z.string().min(1),
  title: z.string().nullish(),
  description: z.string().nullish(),
  url: z.string().nullish(),
  cvss: z.string().nullish(),
  aliases: z.array(z.string()).nullish(),
});

const packageSchema = z.object({
  name: z.string().min(1),
  version: z.string().nullish(),
});

const versionsSchema = z
  .object({
    patched: z.array(z.string()).nullish(),
  })
  .nullish();

const vulnerabilitySchema = z.object({
  advisory: advisorySchema,
  package: packageSchema,
  versions: versionsSchema,
});

const warningSchema = z.object({
  kind: z.string().min(1),
  advisory: advisorySchema.nullish(),
  package: packageSchema,
  versions: versionsSchema,
});

/** Unknown fields are dropped, so newer auditor releases still parse. */
const auditOutputSchema = z.object({
  vulnerabilities: z.object({
    found: z.boolean().nullish(),
    list: z.array(vulnerabilitySchema),
  }),
  warnings: z.record(z.array(warningSchema)).nullish(),
});

type Advisory = z.infer<typeof advisorySchema>;
type AuditedPackage = z.infer<typeof packageSchema>;
type Versions = z.infer<typeof versionsSchema>;

export type ParseResult =
  | { ok: true; findings: Finding[] }
  | { ok: false; error: string };

export type ParseOptions = {
  /** Include unmaintained/unsound/yanked warnings as informational findings. */
  includeWarnings: boolean;
};

const compareText = (left: string, right: string): number => {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
};

const uniqueSorted = (values: Iterable<string>): string[] =>
  [...new Set(values)].filter((value) => value.length > 0).sort(compareText);

const severityOf = (advisory: Advisory): Severity => {
  if (!advisory.cvss) {
    return SEVERITY.UNKNOWN;
  }
  const score = cvssBaseScore(advisory.cvss);
  return score === null ? SEVERITY.UNKNOWN : severityFromScore(score);
};

const toFinding = (
  advisory: Advisory,
  auditedPackage: AuditedPackage,
  versions: Versions,
  severity: Severity,
  warningKind?: string,
): Finding => ({
  advisoryId: advisory.id,
  packageName: auditedPackage.name,
  packageVersion: auditedPackage.version ?? '',
  severity,
  title: advisory.title?.trim() ?? '',
  description: advisory.description?.trim() ?? '',
  patchedVersions: uniqueSorted(versions?.patched ?? []),
  aliases: uniqueSorted(advisory.aliases ?? []),
  url: advisory.url ?? undefined,
  warningKind,
});

const formatIssue = (error: z.ZodError): string => {
  const issue = error.issues[0];
  if (!issue) {
    return 'unexpected structure';
  }
  return `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`;
};

// One finding per advisory id; an advisory hitting several versions of a crate lists them all.
const mergeByAdvisory = (findings: Finding[]): Finding[] => {
  const merged = new Map<string, Finding>();
  for (const finding of findings) {
    const existing = merged.get(finding.advisoryId);
    if (!existing) {
      merged.set(finding.advisoryId, finding);
      continue;
    }
    merged.set(finding.advisoryId, {
      ...existing,
      packageVersion: uniqueSorted([
        ...existing.packageVersion.split(', '),
        ...finding.packageVersion.split(', '),
      ]).join(', '),
      patchedVersions: uniqueSorted([...existing.patchedVersions, ...finding.patchedVersions]),
      aliases: uniqueSorted([...existing.aliases, ...finding.aliases]),
    });
  }
  return [...merged.values()].sort((left, right) => compareText(left.advisoryId, right.advisoryId));
};

/**
 * Decode the auditor's JSON report. Any entry lacking an advisory id or
 * package name rejects the whole output.
 */
export const parseAuditOutput = (rawOutput: string, options: ParseOptions): ParseResult => {
  const trimmed = rawOutput.trim();
  if (trimmed.length === 0) {
    return { ok: false, error: 'auditor produced no output' };
  }

  let document: unknown;
  try {
    document = JSON.parse(trimmed);
  } catch (error) {
    return {
      ok: false,
      error: `output is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const parsed = auditOutputSchema.safeParse(document);
  if (!parsed.success) {
    return { ok: false, error: `unexpected output structure at ${formatIssue(parsed.error)}` };
  }

  const findings: Finding[] = parsed.data.vulnerabilities.list.map((entry) =>
    toFinding(entry.advisory, entry.package, entry.versions, severityOf(entry.advisory)),
  );

  if (options.includeWarnings) {
    const warningKinds = Object.keys(parsed.data.warnings ?? {}).sort(compareText);
    for (const kind of warningKinds) {
      for (const warning of parsed.data.warnings?.[kind] ?? []) {
        if (warning.advisory) {
          findings.push(
            toFinding(warning.advisory, warning.package, warning.versions, SEVERITY.INFORMATIONAL, warning.kind),
          );
          continue;
        }
        if (warning.kind !== 'yanked') {
          return { ok: false, error: `warnings.${kind}: ${warning.kind} warning without advisory` };
        }
        const version = warning.package.version ?? 'unknown';
        findings.push(
          toFinding(
            {
              id: `YANKED-${warning.package.name}-${version}`,
              package: warning.package.name,
              title: `${warning.package.name} ${version} has been yanked`,
            },
            warning.package,
            warning.versions,
            SEVERITY.INFORMATIONAL,
            warning.kind,
          ),
        );
      }
    }
  }

  return { ok: true, findings: mergeByAdvisory(findings) };
};
