import { TimeoutError, type HttpHeaders, type QueryParams } from '@qbit-kit/resilient-http-core';
import { parseSetCookie } from './sessionCache';
import type { SessionState } from './sessionState';
import type {
  FormFields,
  PerformRequestOptions,
  QbittorrentResponse,
  ResolvedClientConfig,
} from './types';

const decoder = new TextDecoder();

/**
 * Issues single HTTP requests against the WebUI: URL building, form encoding,
 * session cookies in and out, and the per-request timeout. No retries here.
 */
export class Requester {
  constructor(
    private readonly config: () => ResolvedClientConfig,
    private readonly state: SessionState,
  ) {}

  async perform(options: PerformRequestOptions): Promise<QbittorrentResponse> {
    const config = this.config();
    const headers: HttpHeaders = { ...options.headers };
    let body: string | undefined;

    if (options.form) {
      headers['content-type'] = 'application/x-www-form-urlencoded';
      body = encodeForm(options.form);
    }

    if (options.useSession) {
      const cookie = this.state.cache.cookieHeader();
      if (cookie) {
        headers.cookie = cookie;
      }
    }

    const url = buildUrl(config.baseUrl, options.path, options.query);
    const timeoutMs = options.timeoutMs ?? config.timeoutMs;
    const controller = new AbortController();
    const callerSignal = options.signal;
    const abortHandler = () => controller.abort(callerSignal?.reason);

    if (callerSignal) {
      if (callerSignal.aborted) {
        controller.abort(callerSignal.reason);
      } else {
        callerSignal.addEventListener('abort', abortHandler, { once: true });
      }
    }

    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    try {
      const raw = await config.transport(
        { method: options.method, url, headers, body },
        controller.signal,
      );
      const cookies = raw.cookies ?? [];

      if (options.applyReceivedArtifacts && cookies.length > 0) {
        this.state.cache.update(parseSetCookie(cookies));
      }

      return {
        status: raw.status,
        headers: raw.headers,
        cookies,
        body: decoder.decode(raw.body),
      };
    } catch (error) {
      if (timedOut && !callerSignal?.aborted) {
        throw new TimeoutError(`Request timed out after ${timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
      callerSignal?.removeEventListener('abort', abortHandler);
    }
  }
}

export function buildUrl(baseUrl: string, path: string, params?: QueryParams): string {
  const url = new URL(`${baseUrl.replace(/\/+$/, '')}${path.startsWith('/') ? path : `/${path}`}`);
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.append(key, String(value));
      }
    }
  }
  return url.toString();
}

export function encodeForm(form: FormFields): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(form)) {
    if (value !== undefined) {
      params.append(key, String(value));
    }
  }
  return params.toString();
}
