/**
 * HTTP transport for the tenant API.
 *
 * The API client speaks to the wire only through `HttpTransport`, so tests
 * can swap in an in-process fake tenant. `NodeHttpTransport` is the
 * production implementation on Node's built-in `node:http` / `node:https`.
 */

import * as http from 'node:http';
import * as https from 'node:https';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface HttpRequest {
  method: HttpMethod;
  /** Absolute URL including the query string. */
  url: string;
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  /** Header names lower-cased; repeated headers joined with ", ". */
  headers: Record<string, string>;
  body: string;
}

export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
  close?(): void;
}

// ---------------------------------------------------------------------------
// NodeHttpTransport
// ---------------------------------------------------------------------------

export class NodeHttpTransport implements HttpTransport {
  private readonly httpAgent = new http.Agent({ keepAlive: true });
  private readonly httpsAgent = new https.Agent({ keepAlive: true });
  private closed = false;

  send(request: HttpRequest): Promise<HttpResponse> {
    if (this.closed) {
      return Promise.reject(new Error('Transport is closed'));
    }

    const url = new URL(request.url);
    const secure = url.protocol === 'https:';
    const headers: Record<string, string> = { ...request.headers };
    if (request.body !== undefined) {
      headers['Content-Length'] = String(Buffer.byteLength(request.body));
    }

    const options: http.RequestOptions = {
      method: request.method,
      headers,
      agent: secure ? this.httpsAgent : this.httpAgent,
    };

    return new Promise<HttpResponse>((resolve, reject) => {
      const onResponse = (res: http.IncomingMessage): void => {
        let data = '';
        res.setEncoding('utf-8');
        res.on('data', (chunk: string) => {
          data += chunk;
        });
        res.on('end', () => {
          resolve({
            status: res.statusCode ?? 0,
            headers: normalizeHeaders(res.headers),
            body: data,
          });
        });
        res.on('error', reject);
      };

      const req = secure
        ? https.request(url, options, onResponse)
        : http.request(url, options, onResponse);

      req.setTimeout(request.timeoutMs, () => {
        req.destroy(new Error(`Request timed out after ${request.timeoutMs}ms`));
      });
      req.on('error', reject);

      if (request.body !== undefined) {
        req.write(request.body);
      }
      req.end();
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}

export function normalizeHeaders(raw: http.IncomingHttpHeaders): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    headers[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return headers;
}
