import fs from 'node:fs/promises';

export type LogReadResult =
  | { ok: true; content: string; bytes: number }
  | { ok: false; error: 'not_found' | 'unreadable'; code?: string };

function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Reads a captured log in one go. Any errno failure on the path (missing,
 * directory, permissions, symlink loop, name too long...) comes back as a
 * result; only errors without an errno code are rethrown.
 */
export async function readLogFile(logPath: string): Promise<LogReadResult> {
  try {
    const data = await fs.readFile(logPath);
    return { ok: true, content: data.toString('utf-8'), bytes: data.byteLength };
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') return { ok: false, error: 'not_found', code };
    if (code) return { ok: false, error: 'unreadable', code };
    throw error;
  }
}
