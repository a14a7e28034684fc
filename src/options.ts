import pc from 'picocolors';

export type CheckOptions = {
  verbose: boolean;
  color: boolean;
};

export type CliFlags = {
  verbose?: boolean;
  debug?: boolean;
};

function envFlag(value: string | undefined): boolean {
  if (value == null) return false;
  const normalized = value.trim().toLowerCase();
  return normalized !== '' && normalized !== '0' && normalized !== 'false';
}

export function resolveOptions(
  flags: CliFlags,
  env: NodeJS.ProcessEnv = process.env,
  color: boolean = pc.isColorSupported,
): CheckOptions {
  const verbose = Boolean(flags.verbose || flags.debug) || envFlag(env.UNITY_SUMMARY_DEBUG) || envFlag(env.DEBUG);
  return { verbose, color };
}
