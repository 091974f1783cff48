import { type } from 'arktype';
import { ConfigurationError } from '../../core/errors.js';

export const CREDENTIALS_KEY = 'credentials';

export interface Credentials {
  apiEndpoint: string;
  downloadEndpoint: string;
  token: string;
}

// Every value of the document must be a string, known key or not
const CredentialsDocumentSchema = type({
  '[string]': 'string',
  'apiEndpoint?': 'string',
  'downloadEndpoint?': 'string',
  'token?': 'string',
});

/**
 * Read the issuance credentials from the data of a Secret.
 *
 * The `credentials` key holds base64 encoded JSON
 * `{apiEndpoint, token, downloadEndpoint}`; all three are required.
 */
export function parseCredentials(secretData: Record<string, string> | undefined): Credentials {
  const encoded = secretData?.[CREDENTIALS_KEY];
  if (encoded === undefined) {
    throw new ConfigurationError(
      `cannot unmarshal credentials as JSON: secret has no "${CREDENTIALS_KEY}" key`
    );
  }

  let document: unknown;
  try {
    document = JSON.parse(Buffer.from(encoded, 'base64').toString('utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `cannot unmarshal credentials as JSON: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      { cause: error }
    );
  }

  const parsed = CredentialsDocumentSchema(document);
  if (parsed instanceof type.errors) {
    throw new ConfigurationError(`cannot unmarshal credentials as JSON: ${parsed.summary}`);
  }

  if (!parsed.apiEndpoint) {
    throw new ConfigurationError('missing API endpoint in secret', { key: 'apiEndpoint' });
  }

  if (!parsed.downloadEndpoint) {
    throw new ConfigurationError('missing download endpoint in secret', { key: 'downloadEndpoint' });
  }

  if (!parsed.token) {
    throw new ConfigurationError('missing token in secret', { key: 'token' });
  }

  return {
    apiEndpoint: parsed.apiEndpoint,
    downloadEndpoint: parsed.downloadEndpoint,
    token: parsed.token,
  };
}
