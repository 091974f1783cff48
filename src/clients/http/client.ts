/**
 * Minimal HTTP(S) transport for the issuance client.
 *
 * Uses Node's http/https modules directly so TLS verification can be toggled
 * per request without a process-wide agent.
 */

import * as http from 'node:http';
import * as https from 'node:https';
import { TransportError } from '../../core/errors.js';
import { getComponentLogger, type OperatorLogger } from '../../core/logging/index.js';

export type HttpMethod = 'GET' | 'POST';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  body?: string;
  headers?: Record<string, string>;
  /**
   * Skip verification of the server certificate
   */
  skipTLSVerify?: boolean;
  /**
   * Whole-exchange timeout in milliseconds
   */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface HttpResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

export interface HttpClient {
  /**
   * Send one request. Resolves only for 200 responses; anything else rejects
   * with a TransportError whose message is the HTTP status text.
   */
  sendRequest(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Status text for a code, e.g. `Not Found` for 404
 */
export function statusText(statusCode: number): string {
  return http.STATUS_CODES[statusCode] ?? `HTTP ${statusCode}`;
}

export class NodeHttpClient implements HttpClient {
  private readonly logger: OperatorLogger;

  constructor(logger?: OperatorLogger) {
    this.logger = logger ?? getComponentLogger('http-client');
  }

  async sendRequest(request: HttpRequest): Promise<HttpResponse> {
    let response: HttpResponse;
    try {
      response = await this.makeRequest(request);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError(`http request to "${request.url}" failed: ${message}`, undefined, {
        cause: error,
      });
    }

    this.logger.debug('http request sent', {
      method: request.method,
      url: request.url,
      statusCode: response.statusCode,
    });

    if (response.statusCode !== 200) {
      this.logger.info('request failed', {
        method: request.method,
        url: request.url,
        statusCode: response.statusCode,
        body: response.body,
      });
      throw new TransportError(statusText(response.statusCode), response.statusCode);
    }

    return response;
  }

  private makeRequest(request: HttpRequest): Promise<HttpResponse> {
    return new Promise((resolve, reject) => {
      const url = new URL(request.url);
      const isHttps = url.protocol === 'https:';
      const body = request.body === undefined ? undefined : Buffer.from(request.body, 'utf-8');

      const headers: Record<string, string> = { ...request.headers };
      if (body) {
        headers['content-type'] ??= 'application/json';
        headers['content-length'] = String(body.length);
      }

      const options: https.RequestOptions = {
        method: request.method,
        headers,
        ...(request.signal && { signal: request.signal }),
        ...(isHttps && { rejectUnauthorized: request.skipTLSVerify !== true }),
      };

      const onResponse = (res: http.IncomingMessage): void => {
        const chunks: Buffer[] = [];

        res.on('data', (chunk: Buffer) => {
          chunks.push(chunk);
        });

        res.on('error', reject);

        res.on('end', () => {
          const responseHeaders: Record<string, string> = {};
          for (const [key, value] of Object.entries(res.headers)) {
            if (value !== undefined) {
              responseHeaders[key] = Array.isArray(value) ? value.join(', ') : value;
            }
          }

          resolve({
            statusCode: res.statusCode ?? 0,
            headers: responseHeaders,
            body: Buffer.concat(chunks).toString('utf-8'),
          });
        });
      };

      const req = isHttps
        ? https.request(url, options, onResponse)
        : http.request(url, options, onResponse);

      req.on('error', reject);

      if (request.timeoutMs !== undefined && request.timeoutMs > 0) {
        const timeoutMs = request.timeoutMs;
        const timer = setTimeout(() => {
          req.destroy(new Error(`request timed out after ${timeoutMs}ms`));
        }, timeoutMs);
        timer.unref();
        req.on('close', () => clearTimeout(timer));
      }

      if (body) {
        req.write(body);
      }

      req.end();
    });
  }
}
