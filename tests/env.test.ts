import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { loadDotEnv, parseDotEnv } from '../src/env.js';

describe('parseDotEnv', () => {
  it('reads pairs and strips quotes and export prefixes', () => {
    const content = [
      '# collector settings',
      '',
      'COLLECTOR_SHEET_ID=sheet-123',
      'export COLLECTOR_SHEET_TAB="Business discounts"',
      "COLLECTOR_CSV_PATH='data/out.csv'",
      'COLLECTOR_LISTING_URL=https://example.test/list?a=1',
      'not a pair'
    ].join('\n');

    expect(parseDotEnv(content)).toEqual({
      COLLECTOR_SHEET_ID: 'sheet-123',
      COLLECTOR_SHEET_TAB: 'Business discounts',
      COLLECTOR_CSV_PATH: 'data/out.csv',
      COLLECTOR_LISTING_URL: 'https://example.test/list?a=1'
    });
  });
});

describe('loadDotEnv', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'collector-env-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('fills unset variables only', async () => {
    const envPath = path.join(dir, '.env');
    await fs.writeFile(envPath, 'COLLECTOR_SHEET_ID=from-file\r\nCOLLECTOR_SHEET_TAB=FromFile\r\n');
    const env: NodeJS.ProcessEnv = { COLLECTOR_SHEET_ID: 'from-shell' };

    await expect(loadDotEnv(envPath, env)).resolves.toBe(true);
    expect(env).toEqual({ COLLECTOR_SHEET_ID: 'from-shell', COLLECTOR_SHEET_TAB: 'FromFile' });
  });

  it('returns false when there is no file', async () => {
    const env: NodeJS.ProcessEnv = {};
    await expect(loadDotEnv(path.join(dir, 'missing.env'), env)).resolves.toBe(false);
    expect(env).toEqual({});
  });
});
