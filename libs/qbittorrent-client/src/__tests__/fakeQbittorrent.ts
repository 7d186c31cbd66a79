import { setTimeout as sleep } from 'timers/promises';
import type {
  HttpTransport,
  Logger,
  RawHttpResponse,
  TransportRequest,
} from '@qbit-kit/resilient-http-core';
import { vi } from 'vitest';

export const toBody = (text: string): ArrayBuffer => {
  const bytes = new TextEncoder().encode(text);
  const copy = new Uint8Array(bytes.byteLength);
  copy.set(bytes);
  return copy.buffer;
};

export const text = (status: number, body = '', cookies: string[] = []): RawHttpResponse => ({
  status,
  headers: { 'content-type': 'text/plain; charset=UTF-8' },
  cookies,
  body: toBody(body),
});

export const json = (payload: unknown, status = 200): RawHttpResponse => ({
  status,
  headers: { 'content-type': 'application/json' },
  cookies: [],
  body: toBody(JSON.stringify(payload)),
});

export const silentLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

type RouteHandler = (req: TransportRequest) => RawHttpResponse;

/**
 * In-process stand-in for the qBittorrent WebUI. Sessions are `SID` cookies
 * issued by /auth/login; `on()` overrides a path regardless of session.
 */
export class FakeQbittorrent {
  readonly requests: TransportRequest[] = [];
  username = 'admin';
  password = 'test-secret';
  version = 'v4.6.2';
  /** Every request fails with ECONNREFUSED. */
  down = false;
  /** Delay before answering; honours the abort signal. */
  delayMs = 0;
  private nextSessionId = 1;
  private readonly sessions = new Set<string>();
  private readonly routes = new Map<string, RouteHandler>();

  readonly transport: HttpTransport = async (req, signal) => {
    this.requests.push(req);
    if (this.delayMs > 0) {
      await sleep(this.delayMs, undefined, { signal });
    }
    if (this.down) {
      throw Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:8080'), {
        code: 'ECONNREFUSED',
      });
    }
    return this.handle(req);
  };

  on(path: string, handler: RouteHandler): this {
    this.routes.set(path, handler);
    return this;
  }

  /** Forgets every issued session, as a server-side timeout would. */
  expireSessions(): void {
    this.sessions.clear();
  }

  callsTo(path: string): TransportRequest[] {
    return this.requests.filter((req) => new URL(req.url).pathname === path);
  }

  private handle(req: TransportRequest): RawHttpResponse {
    const path = new URL(req.url).pathname;
    const route = this.routes.get(path);
    if (route) {
      return route(req);
    }

    switch (path) {
      case '/api/v2/auth/login':
        return this.login(req);
      case '/api/v2/auth/logout':
        this.sessions.delete(this.sessionOf(req) ?? '');
        return text(200);
      default:
        if (!this.isAuthorized(req)) {
          return text(403, 'Forbidden');
        }
        if (path === '/api/v2/app/version') {
          return text(200, this.version);
        }
        return text(404, 'Not Found');
    }
  }

  private login(req: TransportRequest): RawHttpResponse {
    const form = new URLSearchParams(req.body ?? '');
    if (form.get('username') !== this.username || form.get('password') !== this.password) {
      return text(200, 'Fails.');
    }
    const sessionId = `sid-${this.nextSessionId}`;
    this.nextSessionId += 1;
    this.sessions.add(sessionId);
    return text(200, 'Ok.', [`SID=${sessionId}; HttpOnly; SameSite=Strict; path=/`]);
  }

  private sessionOf(req: TransportRequest): string | undefined {
    const match = /(?:^|;\s*)SID=([^;]+)/.exec(req.headers.cookie ?? '');
    return match?.[1];
  }

  private isAuthorized(req: TransportRequest): boolean {
    const session = this.sessionOf(req);
    return session !== undefined && this.sessions.has(session);
  }
}
