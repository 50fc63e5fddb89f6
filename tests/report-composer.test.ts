import { describe, expect, it } from 'vitest';

import { composeReport } from '../src/application/services/report-composer';
import type { TaggedFinding } from '../src/domain/finding';
import type { RunSnapshot } from '../src/domain/run-snapshot';

const settings = { recipients: ['ops@example.com', 'sec@example.com'], subject: 'Periodic audit report' };

const tagged = (overrides: Partial<TaggedFinding> & Pick<TaggedFinding, 'advisoryId' | 'tag'>): TaggedFinding => ({
  packageName: 'time',
  packageVersion: '0.1.45',
  severity: 'high',
  title: '',
  description: '',
  patchedVersions: [],
  aliases: [],
  ...overrides,
});

const mixedSnapshot: RunSnapshot = {
  generatedAt: '2026-10-19T07:00:00.000Z',
  results: [
    {
      status: 'ok',
      target: { path: '/usr/local/bin/server', name: 'server' },
      findings: [
        tagged({
          advisoryId: 'RUSTSEC-2024-0002',
          tag: 'known',
          severity: 'unknown',
          packageName: 'ring',
          packageVersion: '0.16.20',
          title: 'Some AES functions may panic',
          patchedVersions: ['>=0.17.12'],
        }),
        tagged({
          advisoryId: 'RUSTSEC-2024-0001',
          tag: 'new',
          severity: 'critical',
          packageName: 'openssl',
          packageVersion: '0.10.55',
          title: 'Use after free',
          patchedVersions: ['>=0.10.60'],
          aliases: ['CVE-2024-0001'],
          url: 'https://rustsec.org/advisories/RUSTSEC-2024-0001',
        }),
        tagged({
          advisoryId: 'RUSTSEC-2021-0139',
          tag: 'new',
          severity: 'informational',
          packageName: 'ansi_term',
          packageVersion: '0.12.1',
          title: 'ansi_term is Unmaintained',
          warningKind: 'unmaintained',
        }),
      ],
      resolved: ['RUSTSEC-2023-0009'],
    },
    {
      status: 'failed',
      target: { path: '/usr/local/bin/worker' },
      failure: { kind: 'timeout', detail: 'audit did not finish within 10m' },
    },
    {
      status: 'ok',
      target: { path: '/usr/local/bin/cli' },
      findings: [],
      resolved: [],
    },
  ],
};

const cleanSnapshot: RunSnapshot = {
  generatedAt: '2026-10-19T07:00:00.000Z',
  results: [
    { status: 'ok', target: { path: '/usr/local/bin/a' }, findings: [], resolved: [] },
    { status: 'ok', target: { path: '/usr/local/bin/b' }, findings: [], resolved: [] },
  ],
};

describe('composeReport', () => {
  it('groups by target then severity and lists failures separately', () => {
    const report = composeReport(mixedSnapshot, settings);

    expect(report.body).toBe(
      [
        'Audit run 2026-10-19T07:00:00.000Z',
        'Targets: 3 audited, 1 failed',
        'Findings: 2 new, 1 known, 1 resolved',
        '',
        'FAILED AUDITS',
        '  /usr/local/bin/worker',
        '    timeout: audit did not finish within 10m',
        '',
        'server (/usr/local/bin/server)',
        '  CRITICAL',
        '    [NEW]   RUSTSEC-2024-0001  openssl 0.10.55',
        '            Use after free',
        '            patched: >=0.10.60',
        '            aliases: CVE-2024-0001',
        '            https://rustsec.org/advisories/RUSTSEC-2024-0001',
        '  UNKNOWN',
        '    [known] RUSTSEC-2024-0002  ring 0.16.20',
        '            Some AES functions may panic',
        '            patched: >=0.17.12',
        '  INFORMATIONAL',
        '    [NEW]   RUSTSEC-2021-0139  ansi_term 0.12.1 (unmaintained)',
        '            ansi_term is Unmaintained',
        '  RESOLVED SINCE LAST RUN',
        '    [resolved] RUSTSEC-2023-0009',
        '',
        '/usr/local/bin/cli',
        '  No known vulnerabilities.',
        '',
      ].join('\n'),
    );
  });

  it('flags failed runs in the subject', () => {
    expect(composeReport(mixedSnapshot, settings).subject).toBe('[AUDIT FAILED] Periodic audit report');
  });

  it('flags new and known findings in the subject', () => {
    const withNew: RunSnapshot = {
      ...cleanSnapshot,
      results: [
        { status: 'ok', target: { path: '/a' }, findings: [tagged({ advisoryId: 'X', tag: 'new' })], resolved: [] },
      ],
    };
    const withKnown: RunSnapshot = {
      ...cleanSnapshot,
      results: [
        { status: 'ok', target: { path: '/a' }, findings: [tagged({ advisoryId: 'X', tag: 'known' })], resolved: [] },
      ],
    };

    expect(composeReport(withNew, settings).subject).toBe('[NEW VULNERABILITIES] Periodic audit report');
    expect(composeReport(withKnown, settings).subject).toBe('[VULNERABILITIES FOUND] Periodic audit report');
  });

  it('still produces a report for a clean run', () => {
    const report = composeReport(cleanSnapshot, settings);

    expect(report.subject).toBe('Periodic audit report');
    expect(report.body).toBe(
      [
        'Audit run 2026-10-19T07:00:00.000Z',
        'Targets: 2 audited, 0 failed',
        'Findings: 0 new, 0 known, 0 resolved',
        '',
        '/usr/local/bin/a',
        '  No known vulnerabilities.',
        '',
        '/usr/local/bin/b',
        '  No known vulnerabilities.',
        '',
      ].join('\n'),
    );
  });

  it('lists new findings before known ones within a severity', () => {
    const snapshot: RunSnapshot = {
      ...cleanSnapshot,
      results: [
        {
          status: 'ok',
          target: { path: '/a' },
          findings: [
            tagged({ advisoryId: 'A', tag: 'known' }),
            tagged({ advisoryId: 'C', tag: 'new' }),
            tagged({ advisoryId: 'B', tag: 'new' }),
          ],
          resolved: [],
        },
      ],
    };

    const lines = composeReport(snapshot, settings).body.split('\n').filter((line) => line.startsWith('    ['));

    expect(lines).toEqual(['    [NEW]   B  time 0.1.45', '    [NEW]   C  time 0.1.45', '    [known] A  time 0.1.45']);
  });

  it('shows the first paragraph of the description under the title', () => {
    const longText = 'word '.repeat(40).trim();
    const snapshot: RunSnapshot = {
      ...cleanSnapshot,
      results: [
        {
          status: 'ok',
          target: { path: '/a' },
          findings: [
            tagged({
              advisoryId: 'A',
              tag: 'new',
              title: 'Overflow in parser',
              description: '  Crafted input\n  overflows the buffer.\n\nUpgrade to fix.',
            }),
            tagged({ advisoryId: 'B', tag: 'new', description: longText }),
          ],
          resolved: [],
        },
      ],
    };

    const lines = composeReport(snapshot, settings).body.split('\n');

    expect(lines.slice(5, 11)).toEqual([
      '  HIGH',
      '    [NEW]   A  time 0.1.45',
      '            Overflow in parser',
      '            Crafted input overflows the buffer.',
      '    [NEW]   B  time 0.1.45',
      `            ${'word '.repeat(31)}wo...`,
    ]);
  });

  it('is deterministic and carries recipients and snapshot', () => {
    const first = composeReport(mixedSnapshot, settings);
    const second = composeReport(mixedSnapshot, settings);

    expect(first).toEqual(second);
    expect(first.recipients).toEqual(['ops@example.com', 'sec@example.com']);
    expect(first.snapshot).toBe(mixedSnapshot);
  });
});
