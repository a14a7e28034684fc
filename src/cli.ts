import { Command, CommanderError } from 'commander';
import ora from 'ora';
import pc from 'picocolors';
import { classifyLog, exitCodeFor, type Outcome } from './outcome.js';
import { resolveOptions, type CheckOptions, type CliFlags } from './options.js';
import { PROGRAM_NAME, renderReport } from './report.js';

export const VERSION = '1.0.0';

export type CliIO = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  env?: NodeJS.ProcessEnv;
  isTTY?: boolean;
  color?: boolean;
};

export function processIO(): CliIO {
  return {
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    isTTY: Boolean(process.stderr.isTTY),
  };
}

function writeLines(stream: NodeJS.WritableStream, lines: string[]) {
  for (const line of lines) stream.write(`${line}\n`);
}

function debugLines(outcome: Outcome): string[] {
  switch (outcome.kind) {
    case 'completed':
      return [
        `read ${outcome.bytes} bytes from ${outcome.path}`,
        `found ${outcome.matchCount} summary line${outcome.matchCount === 1 ? '' : 's'}, using the one at offset ${outcome.offset}`,
      ];
    case 'summary_not_found':
      return [`read ${outcome.bytes} bytes from ${outcome.path}`, 'found 0 summary lines'];
    case 'file_missing':
      return [`could not read ${outcome.path}${outcome.code ? ` (${outcome.code})` : ''}`];
    case 'invalid_arguments':
      return [];
  }
}

async function checkLog(logFile: string, options: CheckOptions, io: CliIO): Promise<Outcome> {
  const spin = ora({ text: `Reading ${logFile}`, stream: io.stderr, isSilent: !io.isTTY }).start();
  const outcome = await classifyLog(logFile).finally(() => spin.stop());
  if (options.verbose) {
    const c = pc.createColors(options.color);
    writeLines(io.stderr, debugLines(outcome).map(line => c.dim(`debug: ${line}`)));
  }
  return outcome;
}

/**
 * Runs the checker against `argv` (user arguments only, no node/script
 * prefix) and resolves with the exit code for the process.
 */
export async function runCli(argv: string[], io: CliIO = processIO()): Promise<number> {
  const color = io.color ?? pc.isColorSupported;
  const state: { outcome?: Outcome; commanderMessage: string } = { commanderMessage: '' };

  const program = new Command();
  program
    .name(PROGRAM_NAME)
    .description('🧪  Turn the Unity test summary in an emulator log into an exit code')
    .version(VERSION)
    .argument('<log-file>', 'Captured serial/emulator log to scan (after -- if it starts with "-")')
    .option('-v, --verbose', 'Print debug details to stderr', false)
    .option('--debug', 'Alias for --verbose', false)
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: str => io.stdout.write(str),
      writeErr: str => io.stderr.write(str),
      outputError: str => {
        state.commanderMessage = str.trimEnd();
      },
    })
    .action(async (logFile: string, flags: CliFlags) => {
      const options = resolveOptions(flags, io.env, color);
      state.outcome = await checkLog(logFile, options, io);
    });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (!(error instanceof CommanderError)) throw error;
    // --help and --version land here too
    if (error.exitCode === 0) return 0;
    state.outcome = { kind: 'invalid_arguments', message: state.commanderMessage };
  }

  const { outcome } = state;
  if (!outcome) throw new Error('No outcome was produced for the given arguments');

  const report = renderReport(outcome, color);
  writeLines(io.stdout, report.stdout);
  writeLines(io.stderr, report.stderr);
  return exitCodeFor(outcome);
}
