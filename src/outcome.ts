import { readLogFile } from './logReader.js';
import { extractSummary, type UnitySummary } from './summaryParser.js';

export type Outcome =
  | { kind: 'invalid_arguments'; message: string }
  | { kind: 'file_missing'; path: string; reason: 'not_found' | 'unreadable'; code?: string }
  | { kind: 'summary_not_found'; path: string; bytes: number }
  | {
      kind: 'completed';
      status: 'all_passed' | 'some_failed';
      path: string;
      summary: UnitySummary;
      matchCount: number;
      offset: number;
      bytes: number;
    };

export type OutcomeKind = Outcome['kind'];

export const EXIT_CODES = {
  allPassed: 0,
  someFailed: 1,
  summaryNotFound: 1,
  fileMissing: 2,
  invalidArguments: 2,
} as const;

export function exitCodeFor(outcome: Outcome): number {
  switch (outcome.kind) {
    case 'completed':
      return outcome.status === 'all_passed' ? EXIT_CODES.allPassed : EXIT_CODES.someFailed;
    case 'summary_not_found':
      return EXIT_CODES.summaryNotFound;
    case 'file_missing':
      return EXIT_CODES.fileMissing;
    case 'invalid_arguments':
      return EXIT_CODES.invalidArguments;
    default: {
      const unreachable: never = outcome;
      throw new Error(`Unhandled outcome ${String(unreachable)}`);
    }
  }
}

export async function classifyLog(logPath: string): Promise<Outcome> {
  const read = await readLogFile(logPath);
  if (!read.ok) {
    return { kind: 'file_missing', path: logPath, reason: read.error, code: read.code };
  }

  const extracted = extractSummary(read.content);
  if (!extracted.ok) {
    return { kind: 'summary_not_found', path: logPath, bytes: read.bytes };
  }

  const { summary } = extracted;
  return {
    kind: 'completed',
    status: summary.failures === 0n ? 'all_passed' : 'some_failed',
    path: logPath,
    summary,
    matchCount: extracted.matchCount,
    offset: extracted.offset,
    bytes: read.bytes,
  };
}
