import { readFileSync, existsSync } from 'node:fs';
import path from 'node:path';

/** Value part of a `KEY=VALUE` line: quotes stripped, ` #` comments dropped from unquoted values. */
export function parseEnvValue(rawValue: string): string {
  const value = rawValue.trim();
  const quote = value[0];
  if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
    return value.slice(1, -1);
  }
  const comment = value.search(/\s#/);
  return comment === -1 ? value : value.slice(0, comment).trimEnd();
}

/**
 * Minimal .env loader.
 *
 * - Reads KEY=VALUE lines, optionally prefixed with `export `
 * - Ignores comments and empty lines
 * - Does not override existing env keys
 */
export function loadEnvFiles(
  filenames: string[] = ['.env', '.env.local'],
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): { loaded: string[] } {
  const loaded: string[] = [];

  for (const name of filenames) {
    const filePath = path.join(cwd, name);
    if (!existsSync(filePath)) continue;

    const raw = readFileSync(filePath, 'utf8');
    for (const line of raw.split(/\r?\n/)) {
      const trimmed = line.trim().replace(/^export\s+/, '');
      if (!trimmed || trimmed.startsWith('#')) continue;

      const eq = trimmed.indexOf('=');
      if (eq === -1) continue;
      const key = trimmed.slice(0, eq).trim();
      if (!key) continue;
      if (env[key] === undefined) env[key] = parseEnvValue(trimmed.slice(eq + 1));
    }

    loaded.push(name);
  }

  return { loaded };
}
