import type { Severity } from './severity';

export type Finding = {
  advisoryId: string;
  packageName: string;
  /** Affected version, or several distinct versions joined with ", ". */
  packageVersion: string;
  severity: Severity;
  title: string;
  description: string;
  patchedVersions: string[];
  aliases: string[];
  url?: string;
  /** Warning kind (unmaintained, unsound, yanked...) when the finding is not a vulnerability. */
  warningKind?: string;
};

export const FINDING_TAG = {
  NEW: 'new',
  KNOWN: 'known',
  RESOLVED: 'resolved',
} as const;

export type TaggedFinding = Finding & {
  tag: typeof FINDING_TAG.NEW | typeof FINDING_TAG.KNOWN;
};
