import { readFileSync, existsSync } from 'fs';
import * as path from 'path';
import { handleUnknownError } from '../errors/index';
import { warn } from '../output/logger';
import { CLI_NAME, DOTENV_FILENAMES } from './constants';

const ASSIGNMENT = /^([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/;

function unquote(raw: string): string {
  if (raw.length >= 2 && ((raw.startsWith('"') && raw.endsWith('"')) || (raw.startsWith("'") && raw.endsWith("'")))) {
    return raw.slice(1, -1);
  }
  // Unquoted values may carry a trailing " #" comment
  const hashAt = raw.indexOf(' #');
  return hashAt === -1 ? raw : raw.slice(0, hashAt).trim();
}

/**
 * Parses KEY=value lines. Blank lines, `#` comments and lines that are not
 * assignments are skipped; a later assignment of the same key wins.
 */
export function parseDotEnv(content: string): Record<string, string> {
  const entries: Record<string, string> = {};
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    const match = ASSIGNMENT.exec(line);
    if (!match || !match[1] || match[2] === undefined) continue;
    entries[match[1]] = unquote(match[2]);
  }
  return entries;
}

/*
 * Best-effort .env loader. Reads the first of .env / .env.local found in
 * `cwd` and copies its entries into `env` without overriding variables that
 * are already set. Returns the path it loaded, if any.
 */
export function loadDotEnv(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): string | undefined {
  for (const filename of DOTENV_FILENAMES) {
    const full = path.resolve(cwd, filename);
    if (!existsSync(full)) continue;
    try {
      const entries = parseDotEnv(readFileSync(full, 'utf-8'));
      for (const [key, value] of Object.entries(entries)) {
        if (env[key] === undefined) {
          env[key] = value;
        }
      }
      return full;
    } catch (e: unknown) {
      // unreadable file; rely on existing env
      const err = handleUnknownError(e, 'Loading .env file');
      warn(`[${CLI_NAME}] Warning: ${err.message}`);
    }
  }
  return undefined;
}
