import { GoogleAuth } from 'google-auth-library';
import { z } from 'zod';
import { env } from '../../config/env';
import { ConfigurationError } from '../../utils/errors';

const serviceAccountSchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

/** Service-account auth from base64-encoded JSON credentials. */
export function createGoogleAuth(feature: string, scopes: string[]): GoogleAuth {
  const credentialsJson = env.GOOGLE_SERVICE_ACCOUNT_JSON;
  if (!credentialsJson) {
    throw new ConfigurationError(feature, 'GOOGLE_SERVICE_ACCOUNT_JSON');
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(credentialsJson, 'base64').toString('utf8'));
  } catch {
    throw new ConfigurationError(feature, 'valid GOOGLE_SERVICE_ACCOUNT_JSON');
  }

  const credentials = serviceAccountSchema.safeParse(decoded);
  if (!credentials.success) {
    throw new ConfigurationError(feature, 'client_email/private_key in GOOGLE_SERVICE_ACCOUNT_JSON');
  }

  return new GoogleAuth({ credentials: credentials.data, scopes });
}
