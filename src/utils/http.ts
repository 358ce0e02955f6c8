import { IncomingHttpHeaders } from 'http';
import https, { RequestOptions } from 'https';
import { URL } from 'url';

const DEFAULT_TIMEOUT = 10000;
const DEFAULT_MAX_BODY_BYTES = 512 * 1024;

const TLS_ERROR_CODES = new Set([
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'ERR_TLS_CERT_ALTNAME_INVALID',
]);

const DNS_ERROR_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_FAIL', 'EAI_NONAME']);

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export type FetchFailureReason = 'timeout' | 'tls' | 'dns' | 'cancelled' | 'network';

export type FetchOutcome =
  | { kind: 'response'; response: HttpResponse }
  | { kind: 'failure'; reason: FetchFailureReason; message: string };

export interface FetchOptions {
  signal?: AbortSignal;
}

export interface NetworkTransport {
  fetch(url: string, options?: FetchOptions): Promise<FetchOutcome>;
}

// The parts of http.IncomingMessage and http.ClientRequest the client touches
export interface ResponseStream {
  statusCode?: number;
  headers: IncomingHttpHeaders;
  on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  on(event: 'end', listener: () => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  destroy(error?: Error): unknown;
}

export interface PendingRequest {
  on(event: 'error', listener: (error: Error) => void): unknown;
  setTimeout(timeoutMs: number, callback: () => void): unknown;
  destroy(error?: Error): unknown;
}

export type GetRequest = (
  url: URL,
  options: RequestOptions,
  callback: (response: ResponseStream) => void
) => PendingRequest;

export interface HttpClientOptions {
  timeoutMs?: number;
  maxBodyBytes?: number;
  userAgent?: string;
  get?: GetRequest;
}

const httpsGet: GetRequest = (url, options, callback) => https.get(url, options, callback);

function flattenHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const flattened: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    flattened[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flattened;
}

function classifyError(error: Error): FetchFailureReason {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : '';

  if (DNS_ERROR_CODES.has(code)) {
    return 'dns';
  }
  if (TLS_ERROR_CODES.has(code) || code.startsWith('ERR_SSL') || code.startsWith('ERR_TLS')) {
    return 'tls';
  }
  if (code === 'ETIMEDOUT') {
    return 'timeout';
  }
  return 'network';
}

// Single GET without redirect following. Never rejects
export class HttpClient implements NetworkTransport {
  private readonly timeoutMs: number;
  private readonly maxBodyBytes: number;
  private readonly userAgent: string;
  private readonly get: GetRequest;

  constructor(options: HttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT;
    this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
    this.userAgent = options.userAgent ?? 'applinks-diagnostics-mcp';
    this.get = options.get ?? httpsGet;
  }

  fetch(url: string, options: FetchOptions = {}): Promise<FetchOutcome> {
    return new Promise(resolve => {
      let parsed: URL;
      try {
        parsed = new URL(url);
      } catch (error) {
        resolve({ kind: 'failure', reason: 'network', message: `Invalid URL: ${url}` });
        return;
      }

      if (parsed.protocol !== 'https:') {
        resolve({ kind: 'failure', reason: 'network', message: `Unsupported protocol: ${parsed.protocol}` });
        return;
      }

      if (options.signal?.aborted) {
        resolve({ kind: 'failure', reason: 'cancelled', message: 'Request cancelled' });
        return;
      }

      let settled = false;
      let timedOut = false;
      let cancelled = false;

      const onAbort = () => {
        cancelled = true;
        request.destroy(new Error('Request cancelled'));
      };

      const settle = (outcome: FetchOutcome) => {
        if (settled) return;
        settled = true;
        options.signal?.removeEventListener('abort', onAbort);
        resolve(outcome);
      };

      const fail = (error: Error) => {
        if (cancelled) {
          settle({ kind: 'failure', reason: 'cancelled', message: 'Request cancelled' });
        } else if (timedOut) {
          settle({ kind: 'failure', reason: 'timeout', message: `Request timed out after ${this.timeoutMs}ms` });
        } else {
          settle({ kind: 'failure', reason: classifyError(error), message: error.message });
        }
      };

      const request = this.get(
        parsed,
        {
          headers: {
            Accept: 'application/json',
            'User-Agent': this.userAgent,
          },
        },
        response => {
          const chunks: Buffer[] = [];
          let received = 0;

          response.on('data', chunk => {
            const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
            received += buffer.length;
            if (received > this.maxBodyBytes) {
              settle({
                kind: 'failure',
                reason: 'network',
                message: `Response body exceeds ${this.maxBodyBytes} bytes`,
              });
              response.destroy();
              return;
            }
            chunks.push(buffer);
          });

          response.on('end', () => {
            settle({
              kind: 'response',
              response: {
                status: response.statusCode ?? 0,
                headers: flattenHeaders(response.headers),
                body: Buffer.concat(chunks).toString('utf-8'),
              },
            });
          });

          response.on('error', fail);
        }
      );

      request.on('error', fail);
      request.setTimeout(this.timeoutMs, () => {
        timedOut = true;
        request.destroy(new Error('Request timed out'));
      });
      options.signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
