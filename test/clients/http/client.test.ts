import * as http from 'node:http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { NodeHttpClient, statusText } from '../../../src/clients/http/client.js';
import { TransportError } from '../../../src/core/errors.js';
import { createLogger } from '../../../src/core/logging/index.js';

interface Received {
  method: string | undefined;
  url: string | undefined;
  headers: http.IncomingHttpHeaders;
  body: string;
}

describe('NodeHttpClient', () => {
  const received: Received[] = [];
  let server: http.Server;
  let baseUrl: string;
  const client = new NodeHttpClient(createLogger({ level: 'fatal' }));

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => {
        received.push({
          method: req.method,
          url: req.url,
          headers: req.headers,
          body: Buffer.concat(chunks).toString('utf-8'),
        });

        if (req.url === '/missing') {
          res.writeHead(404).end('no such task');
        } else if (req.url === '/slow') {
          setTimeout(() => res.writeHead(200).end('{}'), 500);
        } else {
          res.writeHead(200, { 'content-type': 'application/json' }).end('{"taskId":"task-1"}');
        }
      });
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('should send the body and headers and return a 200 response', async () => {
    const response = await client.sendRequest({
      method: 'POST',
      url: `${baseUrl}/certificates`,
      body: '{"subject":{}}',
      headers: { authorization: 'Bearer test-token' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe('{"taskId":"task-1"}');
    expect(response.headers['content-type']).toBe('application/json');

    const request = received.at(-1);
    expect(request?.method).toBe('POST');
    expect(request?.url).toBe('/certificates');
    expect(request?.body).toBe('{"subject":{}}');
    expect(request?.headers.authorization).toBe('Bearer test-token');
    expect(request?.headers['content-type']).toBe('application/json');
    expect(request?.headers['content-length']).toBe('14');
  });

  it('should reject non-200 responses with the status text', async () => {
    const error = await client.sendRequest({ method: 'GET', url: `${baseUrl}/missing` }).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: 'Not Found', statusCode: 404 });
  });

  it('should reject when the exchange times out', async () => {
    await expect(
      client.sendRequest({ method: 'GET', url: `${baseUrl}/slow`, timeoutMs: 50 })
    ).rejects.toThrow(`http request to "${baseUrl}/slow" failed: request timed out after 50ms`);
  });

  it('should reject when the connection fails', async () => {
    await expect(
      client.sendRequest({ method: 'GET', url: 'http://127.0.0.1:1/unreachable' })
    ).rejects.toThrow(/^http request to "http:\/\/127\.0\.0\.1:1\/unreachable" failed: /);
  });

  it('should map status codes to their text', () => {
    expect(statusText(404)).toBe('Not Found');
    expect(statusText(599)).toBe('HTTP 599');
  });
});
