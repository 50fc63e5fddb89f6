import { describe, expect, it } from 'vitest';

import { cvssBaseScore } from '../src/domain/cvss';
import { SEVERITY, compareSeverity, severityFromScore } from '../src/domain/severity';

describe('cvssBaseScore', () => {
  it.each([
    ['CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:U/C:H/I:H/A:H', 9.8],
    ['CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:U/C:N/I:N/A:H', 7.5],
    ['CVSS:3.0/AV:L/AC:L/PR:L/UI:N/S:U/C:H/I:N/A:N', 5.5],
    ['CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:C/C:H/I:H/A:H', 10],
    ['CVSS:3.1/AV:N/AC:H/PR:N/UI:R/S:U/C:L/I:N/A:N', 3.1],
    ['CVSS:3.1/AV:N/AC:L/PR:L/UI:N/S:C/C:L/I:L/A:N', 6.4],
    ['CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:U/C:N/I:N/A:N', 0],
  ])('scores %s as %d', (vector, expected) => {
    expect(cvssBaseScore(vector)).toBe(expected);
  });

  it('ignores metric order and temporal metrics', () => {
    expect(cvssBaseScore('CVSS:3.1/S:U/AV:N/AC:L/PR:N/UI:N/C:N/I:N/A:H/E:P')).toBe(7.5);
  });

  it('returns null for other CVSS versions and incomplete vectors', () => {
    expect(cvssBaseScore('CVSS:4.0/AV:N/AC:L/AT:N/PR:N/UI:N/VC:H/VI:H/VA:H/SC:N/SI:N/SA:N')).toBeNull();
    expect(cvssBaseScore('AV:N/AC:L/Au:N/C:P/I:P/A:P')).toBeNull();
    expect(cvssBaseScore('CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:U/C:H/I:H')).toBeNull();
    expect(cvssBaseScore('CVSS:3.1/AV:X/AC:L/PR:N/UI:N/S:U/C:H/I:H/A:H')).toBeNull();
  });
});

describe('severity', () => {
  it('maps scores onto the qualitative scale', () => {
    expect(severityFromScore(9.8)).toBe(SEVERITY.CRITICAL);
    expect(severityFromScore(9)).toBe(SEVERITY.CRITICAL);
    expect(severityFromScore(7.5)).toBe(SEVERITY.HIGH);
    expect(severityFromScore(4)).toBe(SEVERITY.MEDIUM);
    expect(severityFromScore(3.9)).toBe(SEVERITY.LOW);
    expect(severityFromScore(0)).toBe(SEVERITY.NONE);
  });

  it('orders the most severe first', () => {
    const sorted = [SEVERITY.INFORMATIONAL, SEVERITY.LOW, SEVERITY.CRITICAL, SEVERITY.UNKNOWN].sort(
      compareSeverity,
    );
    expect(sorted).toEqual(['critical', 'low', 'unknown', 'informational']);
  });
});
