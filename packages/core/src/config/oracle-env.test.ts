import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { detectOracleConfig } from '../oracle/llm-client';
import { defaultEnvPaths, loadOracleEnv } from './oracle-env';

describe('loadOracleEnv', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'oracle-env-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('layers the first existing .env under the given environment', () => {
    fs.writeFileSync(path.join(dir, 'first.env'), 'OPENAI_API_KEY=test-secret\nLLM_MODEL=from-file\n');
    fs.writeFileSync(path.join(dir, 'second.env'), 'XAI_API_KEY=test-secret\n');

    const env = loadOracleEnv(
      [path.join(dir, 'missing.env'), path.join(dir, 'first.env'), path.join(dir, 'second.env')],
      { LLM_MODEL: 'from-shell' }
    );

    expect(env).toEqual({ OPENAI_API_KEY: 'test-secret', LLM_MODEL: 'from-shell' });
    expect(detectOracleConfig(env)).toEqual({ provider: 'openai', apiKey: 'test-secret', model: 'from-shell' });
  });

  it('returns a copy of the base environment when no file exists', () => {
    const base = { LLM_PROVIDER: 'ollama' };

    const env = loadOracleEnv([path.join(dir, 'missing.env')], base);

    expect(env).toEqual(base);
    expect(env).not.toBe(base);
  });

  it('looks in the scan root before the working directory', () => {
    expect(defaultEnvPaths('/scan/root', '/work')).toEqual([
      path.join('/scan/root', '.env'),
      path.join('/work', '.env'),
    ]);
    expect(defaultEnvPaths('/same', '/same')).toEqual([path.join('/same', '.env')]);
  });
});
