// Counts are bigints so arbitrarily long digit runs keep their exact value.
export type UnitySummary = {
  tests: bigint;
  failures: bigint;
  ignored: bigint;
};

export type ExtractResult =
  | { ok: true; summary: UnitySummary; matchCount: number; offset: number }
  | { ok: false; error: 'summary_not_found' };

export class SummaryNotFoundError extends Error {
  constructor(message = 'Unity test summary not found in output') {
    super(message);
    this.name = 'SummaryNotFoundError';
  }
}

// Unity prints "X Tests Y Failures Z Ignored" once the run completes.
const SUMMARY_PATTERN = /(\d+)\s+Tests\s+(\d+)\s+Failures\s+(\d+)\s+Ignored/g;

/**
 * Finds the last Unity summary line in a log.
 *
 * Harnesses may print intermediate tallies before the final one, so every
 * non-overlapping match is visited and only the textually last is kept.
 */
export function extractSummary(content: string): ExtractResult {
  let last: RegExpMatchArray | null = null;
  let matchCount = 0;
  for (const m of content.matchAll(SUMMARY_PATTERN)) {
    last = m;
    matchCount++;
  }
  if (!last) return { ok: false, error: 'summary_not_found' };

  const [, tests, failures, ignored] = last;
  return {
    ok: true,
    summary: {
      tests: BigInt(tests),
      failures: BigInt(failures),
      ignored: BigInt(ignored),
    },
    matchCount,
    offset: last.index ?? 0,
  };
}

export function parseUnitySummary(content: string): UnitySummary {
  const result = extractSummary(content);
  if (!result.ok) throw new SummaryNotFoundError();
  return result.summary;
}
