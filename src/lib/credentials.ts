/**
 * CLI Credential Check
 *
 * The CLI owns its own authentication. This only tells the operator, at
 * startup, whether the CLI is likely to find credentials.
 */

import { access } from 'node:fs/promises';

export type CredentialSource = 'credentials-file' | 'api-key-env';

export interface CredentialStatus {
  available: boolean;
  source?: CredentialSource;
}

/**
 * How to authenticate the CLI; included in AUTHENTICATION_REQUIRED errors
 */
export const AUTH_INSTRUCTIONS = [
  'The claude CLI is not authenticated. Authenticate it on the server with one of:',
  '  1. Run `claude setup-token` (or `claude` and then /login) as the service user',
  '  2. Set ANTHROPIC_API_KEY in the service environment',
  '  3. Place a credentials file at ~/.claude/.credentials.json',
].join('\n');

export async function checkCliCredentials(params: {
  credentialsPath: string;
  env?: Record<string, string | undefined>;
}): Promise<CredentialStatus> {
  const env = params.env ?? process.env;

  const hasFile = await access(params.credentialsPath).then(
    () => true,
    () => false
  );
  if (hasFile) {
    return { available: true, source: 'credentials-file' };
  }

  const apiKey = env.ANTHROPIC_API_KEY;
  if (apiKey !== undefined && apiKey.trim() !== '') {
    return { available: true, source: 'api-key-env' };
  }

  return { available: false };
}
