/**
 * HTTP transport for one panel API surface (management or control).
 * Uses native fetch (Node 20+).
 *
 * Every call carries `Authorization: Bearer <key>` and JSON headers, and its
 * outcome is classified here and nowhere else:
 * - 204, or an empty / whitespace body on a success status → `{}`
 * - status >= 400 → ApiError (first `errors[].detail`, else the body as JSON)
 * - a success status with a non-JSON body → DecodeError
 * - network failure, timeout, or `close()` mid-flight → TransportError
 */
import type { HttpMethod, JsonObject, JsonValue, QueryParams } from '@hostpanel/shared';
import { ApiError, DecodeError, TransportError } from '../types/index.js';
import { getObjects, getString, isJsonObject } from './document.js';
import { silentLogger, type Logger } from './logger.js';

/** Longest body excerpt carried by a DecodeError. */
export const BODY_EXCERPT_LIMIT = 500;

export interface TransportOptions {
  /** Surface root, e.g. `https://panel.example.com/api/application`. */
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  logger?: Logger;
  /** Injected for tests; defaults to the global fetch. */
  fetch?: typeof fetch;
}

export interface RequestOptions {
  body?: Record<string, unknown>;
  query?: QueryParams;
}

/** State shared by every request until `close()`. */
interface TransportSession {
  headers: Record<string, string>;
  controller: AbortController;
}

export class PanelTransport {
  private session: TransportSession | null = null;
  private readonly log: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: TransportOptions) {
    this.log = options.logger ?? silentLogger;
    this.fetchImpl = options.fetch ?? fetch;
  }

  get isOpen(): boolean {
    return this.session !== null;
  }

  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<JsonValue> {
    const session = this.acquire();
    const url = buildUrl(this.options.baseUrl, path, options.query);

    const init: RequestInit = { method, headers: session.headers };
    if (options.body !== undefined) {
      init.body = JSON.stringify(options.body);
    }

    const controller = new AbortController();
    init.signal = controller.signal;
    const onClose = (): void => controller.abort();
    session.controller.signal.addEventListener('abort', onClose, { once: true });

    const timeoutMs = this.options.timeoutMs ?? 30000;
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    const startedAt = Date.now();
    try {
      let res: Response;
      let text: string;
      try {
        res = await this.fetchImpl(url, init);
        text = res.status === 204 ? '' : await res.text();
      } catch (err) {
        throw this.transportFailure(err, method, path, timedOut, timeoutMs);
      }

      this.log.debug(
        { method, path, status: res.status, durationMs: Date.now() - startedAt },
        'panel request',
      );
      return decodeResponse(res.status, text);
    } catch (err) {
      if (!(err instanceof DecodeError)) {
        this.log.warn({ method, path, err }, 'panel request failed');
      } else {
        this.log.warn({ method, path, status: err.statusCode }, 'panel response not JSON');
      }
      throw err;
    } finally {
      clearTimeout(timeout);
      session.controller.signal.removeEventListener('abort', onClose);
    }
  }

  async get(path: string, query?: QueryParams): Promise<JsonValue> {
    return this.request('GET', path, query ? { query } : {});
  }

  /**
   * Releases the session. In-flight requests fail with TransportError;
   * a later request opens a fresh session.
   */
  close(): void {
    if (this.session === null) return;
    this.session.controller.abort();
    this.session = null;
    this.log.debug({ baseUrl: this.options.baseUrl }, 'panel transport closed');
  }

  private acquire(): TransportSession {
    if (this.session === null) {
      this.session = {
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          Accept: 'application/json',
          'Content-Type': 'application/json',
        },
        controller: new AbortController(),
      };
    }
    return this.session;
  }

  private transportFailure(
    err: unknown,
    method: string,
    path: string,
    timedOut: boolean,
    timeoutMs: number,
  ): TransportError {
    if (timedOut) {
      return new TransportError(`Panel request timed out after ${timeoutMs}ms`, method, path);
    }
    if (err instanceof Error && err.name === 'AbortError') {
      return new TransportError('Panel transport was closed', method, path);
    }
    const reason = err instanceof Error ? err.message : 'Unknown error';
    return new TransportError(`Failed to reach panel: ${reason}`, method, path);
  }
}

/** Joins base URL, path and query, skipping undefined query values. */
export function buildUrl(baseUrl: string, path: string, query: QueryParams = {}): string {
  const entries = Object.entries(query).filter(
    (kv): kv is [string, string | number | boolean] => kv[1] !== undefined,
  );
  const base = `${baseUrl.replace(/\/+$/, '')}${path}`;
  if (entries.length === 0) return base;
  const qs = entries.map(([k, v]) => `${encodeURIComponent(k)}=${encodeURIComponent(String(v))}`).join('&');
  return `${base}?${qs}`;
}

/** Classifies a status + raw body into a JSON value or a thrown PanelError. */
export function decodeResponse(status: number, text: string): JsonValue {
  if (status === 204) return {};

  if (!text.trim()) {
    if (status >= 400) throw new ApiError(status, `HTTP ${status}`);
    return {};
  }

  let data: JsonValue;
  try {
    data = JSON.parse(text);
  } catch {
    const excerpt = text.slice(0, BODY_EXCERPT_LIMIT);
    if (status >= 400) throw new ApiError(status, excerpt);
    throw new DecodeError(status, excerpt);
  }

  if (status >= 400) {
    const first = isJsonObject(data) ? getObjects(data, 'errors')[0] : undefined;
    throw new ApiError(status, errorMessage(data, first), first && getString(first, 'code'));
  }

  return data;
}

function errorMessage(data: JsonValue, first: JsonObject | undefined): string {
  const detail = first && getString(first, 'detail');
  return detail ?? JSON.stringify(data);
}
