import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';

export const ORACLE_ENV_FILE = '.env';

/**
 * Build the environment used for oracle selection.
 * The first readable .env among the candidates is layered under the process environment,
 * so variables already set in the shell win. process.env itself is never modified.
 */
export function loadOracleEnv(
  candidatePaths: readonly string[],
  base: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
  for (const envPath of candidatePaths) {
    if (!envPath || !fs.existsSync(envPath)) {
      continue;
    }
    try {
      const parsed = dotenv.parse(fs.readFileSync(envPath, 'utf8'));
      console.log(`[OracleEnv] Loaded .env from: ${envPath}`);
      return { ...parsed, ...base };
    } catch (error) {
      console.warn(`[OracleEnv] Could not read ${envPath}:`, error);
    }
  }
  return { ...base };
}

/**
 * .env candidates for a scan: the scan root first, then the working directory.
 */
export function defaultEnvPaths(rootPath: string, cwd: string = process.cwd()): string[] {
  const paths = [path.join(rootPath, ORACLE_ENV_FILE), path.join(cwd, ORACLE_ENV_FILE)];
  return [...new Set(paths)];
}
