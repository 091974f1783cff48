import { type } from 'arktype';
import { skipTLSVerify, waitTimeoutMs } from '../../api/v1alpha1/index.js';
import { ProtocolError, TransportError } from '../../core/errors.js';
import type { OperatorLogger } from '../../core/logging/index.js';
import { type HttpClient, type HttpRequest, NodeHttpClient } from '../http/client.js';
import { parseCredentials } from './credentials.js';
import {
  DownloadResponseSchema,
  type DownloadResponse,
  type IssuanceClient,
  type IssuanceClientBuilder,
  type IssueRequest,
  IssueResponseSchema,
  ValidityResponseSchema,
  type ValidityResponse,
} from './types.js';

export interface CertificateApiClientOptions {
  apiEndpoint: string;
  downloadEndpoint: string;
  token: string;
  timeoutMs: number;
  skipTLSVerify: boolean;
  logger: OperatorLogger;
  httpClient?: HttpClient;
  signal?: AbortSignal;
}

/**
 * Parse a response body that must be a JSON object
 */
export function parseResponseBody(body: string): object {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new ProtocolError('response body is not JSON', { cause: error });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ProtocolError('response body is not JSON');
  }

  return parsed;
}

function unmarshalError(cause: unknown): ProtocolError {
  const message = cause instanceof Error ? cause.message : String(cause);
  return new ProtocolError(`failed to unmarshal response body: ${message}`, { cause });
}

/**
 * Issuance client speaking the certificate API's REST protocol:
 *
 * - `POST {apiEndpoint}` creates a certificate and returns `{taskId}`
 * - `GET {apiEndpoint}{guid}` returns the validity window
 * - `GET {apiEndpoint}{guid}{downloadEndpoint}{form}` returns the archive
 */
export class CertificateApiClient implements IssuanceClient {
  private readonly httpClient: HttpClient;

  constructor(private readonly options: CertificateApiClientOptions) {
    this.httpClient = options.httpClient ?? new NodeHttpClient(options.logger);
  }

  async issue(request: IssueRequest): Promise<string> {
    const body = await this.send(
      { method: 'POST', url: this.options.apiEndpoint, body: JSON.stringify(request) },
      'POST to certificate API failed'
    );
    const result = IssueResponseSchema(this.parse(body));
    if (result instanceof type.errors) {
      throw unmarshalError(new ProtocolError(result.summary));
    }
    return result.taskId;
  }

  async fetchValidity(guid: string): Promise<ValidityResponse> {
    const body = await this.send(
      { method: 'GET', url: `${this.options.apiEndpoint}${guid}` },
      'GET request to certificate API failed'
    );
    const result = ValidityResponseSchema(this.parse(body));
    if (result instanceof type.errors) {
      throw unmarshalError(new ProtocolError(result.summary));
    }
    return result;
  }

  async download(guid: string, form: string): Promise<DownloadResponse> {
    const body = await this.send(
      {
        method: 'GET',
        url: `${this.options.apiEndpoint}${guid}${this.options.downloadEndpoint}${form}`,
      },
      'download request to certificate API failed'
    );
    const result = DownloadResponseSchema(this.parse(body));
    if (result instanceof type.errors) {
      throw unmarshalError(new ProtocolError(result.summary));
    }
    return result;
  }

  private async send(
    request: Pick<HttpRequest, 'method' | 'url' | 'body'>,
    failureMessage: string
  ): Promise<string> {
    try {
      const response = await this.httpClient.sendRequest({
        ...request,
        headers: {
          authorization: `Bearer ${this.options.token}`,
          accept: 'application/json',
        },
        skipTLSVerify: this.options.skipTLSVerify,
        timeoutMs: this.options.timeoutMs,
        ...(this.options.signal && { signal: this.options.signal }),
      });
      return response.body;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const statusCode = error instanceof TransportError ? error.statusCode : undefined;
      throw new TransportError(`${failureMessage}: ${message}`, statusCode, { cause: error });
    }
  }

  private parse(body: string): object {
    try {
      return parseResponseBody(body);
    } catch (error) {
      throw unmarshalError(error);
    }
  }
}

/**
 * Build a CertificateApiClient from a CertificateConfig and its credentials
 * Secret data. Throws a ConfigurationError before any network call when the
 * credentials are incomplete.
 */
export const createIssuanceClient: IssuanceClientBuilder = (config, secretData, context) => {
  const credentials = parseCredentials(secretData);
  const skipVerify = skipTLSVerify(config);

  if (skipVerify) {
    context.logger.debug('TLS verification of the certificate API is disabled', {
      security: 'tls-disabled',
      apiEndpoint: credentials.apiEndpoint,
    });
  }

  return new CertificateApiClient({
    ...credentials,
    timeoutMs: waitTimeoutMs(config),
    skipTLSVerify: skipVerify,
    logger: context.logger,
    ...(context.signal && { signal: context.signal }),
  });
};
