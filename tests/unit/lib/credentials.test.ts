/**
 * CLI Credential Check Unit Tests
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { AUTH_INSTRUCTIONS, checkCliCredentials } from '@/lib/credentials.js';

describe('checkCliCredentials', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'credentials-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should report a credentials file', async () => {
    const credentialsPath = join(dir, '.credentials.json');
    await writeFile(credentialsPath, '{}');

    const status = await checkCliCredentials({ credentialsPath, env: {} });

    expect(status).toEqual({ available: true, source: 'credentials-file' });
  });

  it('should fall back to ANTHROPIC_API_KEY', async () => {
    const status = await checkCliCredentials({
      credentialsPath: join(dir, 'missing.json'),
      env: { ANTHROPIC_API_KEY: 'test-secret' },
    });

    expect(status).toEqual({ available: true, source: 'api-key-env' });
  });

  it('should ignore a blank ANTHROPIC_API_KEY', async () => {
    const status = await checkCliCredentials({
      credentialsPath: join(dir, 'missing.json'),
      env: { ANTHROPIC_API_KEY: '   ' },
    });

    expect(status).toEqual({ available: false });
  });

  it('should describe how to authenticate', () => {
    expect(AUTH_INSTRUCTIONS.split('\n')).toHaveLength(4);
    expect(AUTH_INSTRUCTIONS).toContain('claude setup-token');
  });
});
