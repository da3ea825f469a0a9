import { z } from 'zod';
import { errorMessage } from '../errors.js';
import { readJsonFile } from '../utils/jsonFile.js';
import type { LinkedInConfig } from '../config.js';
import type { AuthTokens } from './types.js';

const tokenFileSchema = z.object({
  access_token: z.string().min(1),
  person_urn: z.string().min(1).optional(),
});

/**
 * Access token from the environment first, then from the token file written
 * by the one-off OAuth flow. Returns null when neither has a token.
 */
export async function loadAuthTokens(
  config: Pick<LinkedInConfig, 'accessToken' | 'personUrn' | 'tokenFile'>,
): Promise<AuthTokens | null> {
  if (config.accessToken) {
    return { accessToken: config.accessToken, personUrn: config.personUrn };
  }

  let stored: unknown;
  try {
    stored = await readJsonFile(config.tokenFile);
  } catch (err) {
    console.warn(`[credentials] Could not read ${config.tokenFile}: ${errorMessage(err)}`);
    return null;
  }
  if (stored === null) return null;

  const parsed = tokenFileSchema.safeParse(stored);
  if (!parsed.success) {
    console.warn(`[credentials] ${config.tokenFile} has no usable access_token.`);
    return null;
  }

  return { accessToken: parsed.data.access_token, personUrn: parsed.data.person_urn };
}
