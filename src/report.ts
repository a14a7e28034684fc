import pc from 'picocolors';
import type { Outcome } from './outcome.js';

export const PROGRAM_NAME = 'unity-summary-check';
export const USAGE = `Usage: ${PROGRAM_NAME} [--] <log-file>  (put -- before a path starting with "-")`;

export const LIKELY_CAUSES = [
  "Tests didn't complete (emulator timeout)",
  'The firmware crashed before printing a summary',
  "Unity framework wasn't properly initialized",
  'Output was truncated',
];

export type Report = {
  stdout: string[];
  stderr: string[];
};

type Colors = ReturnType<typeof pc.createColors>;

function completedLines(outcome: Extract<Outcome, { kind: 'completed' }>, c: Colors): string[] {
  const { tests, failures, ignored } = outcome.summary;
  const lines = [
    c.bold('Test Results:'),
    `  Total Tests: ${tests}`,
    `  Failures: ${failures === 0n ? failures : c.red(String(failures))}`,
    `  Ignored: ${ignored === 0n ? ignored : c.yellow(String(ignored))}`,
    '',
  ];
  if (outcome.status === 'all_passed') lines.push(c.green('✅ All tests passed!'));
  else lines.push(c.red(`❌ ${failures} test(s) failed`));
  return lines;
}

/**
 * Renders what the user sees for an outcome. Completed runs report on stdout;
 * everything else goes to stderr.
 */
export function renderReport(outcome: Outcome, color = false): Report {
  const c = pc.createColors(color);
  const error = (message: string) => `${c.red('Error:')} ${message}`;

  switch (outcome.kind) {
    case 'completed':
      return { stdout: completedLines(outcome, c), stderr: [] };
    case 'summary_not_found':
      return {
        stdout: [],
        stderr: [
          error(`Unity test summary not found in ${outcome.path}`),
          '',
          'This usually means:',
          ...LIKELY_CAUSES.map(cause => `  - ${cause}`),
        ],
      };
    case 'file_missing':
      return {
        stdout: [],
        stderr: [
          outcome.reason === 'not_found'
            ? error(`Log file not found: ${outcome.path}`)
            : error(`Cannot read log file ${outcome.path}${outcome.code ? ` (${outcome.code})` : ''}`),
        ],
      };
    case 'invalid_arguments':
      return {
        stdout: [],
        stderr: outcome.message ? [outcome.message, USAGE] : [USAGE],
      };
  }
}
