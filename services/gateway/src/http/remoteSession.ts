import { Buffer } from 'node:buffer';
import { Agent, fetch, Headers } from 'undici';

export interface RemoteSessionOptions {
  baseUrl: string;
  username?: string | null;
  password?: string | null;
  timeoutMs?: number;
  userAgent?: string;
}

export interface SessionRequestInit {
  method?: string;
  body?: string | Uint8Array;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface SessionResponse {
  url: string;
  status: number;
  ok: boolean;
  contentType: string | null;
  body: Uint8Array;
}

export function responseText(response: SessionResponse): string {
  return Buffer.from(response.body).toString('utf8');
}

function combineSignals(primary: AbortController, external?: AbortSignal): () => void {
  if (!external) {
    return () => undefined;
  }
  if (external.aborted) {
    primary.abort(external.reason);
    return () => undefined;
  }
  const onAbort = () => {
    primary.abort(external.reason);
  };
  external.addEventListener('abort', onAbort, { once: true });
  return () => external.removeEventListener('abort', onAbort);
}

/**
 * Long-lived connection pool bound to one remote base address.
 *
 * Paths resolve against the base URL. Basic credentials are attached only when both
 * username and password are configured. Bodies are read fully before returning, so the
 * timeout covers the whole exchange.
 */
export class RemoteSession {
  readonly baseUrl: string;
  private readonly agent: Agent;
  private readonly authorization: string | null;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private closing: Promise<void> | null = null;

  constructor(options: RemoteSessionOptions) {
    if (!options.baseUrl) {
      throw new Error('RemoteSession requires a baseUrl');
    }
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.agent = new Agent({ keepAliveTimeout: 10_000, connections: 32 });
    this.authorization =
      options.username && options.password
        ? `Basic ${Buffer.from(`${options.username}:${options.password}`).toString('base64')}`
        : null;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.userAgent = options.userAgent ?? 'outpaint-gateway/0.1';
  }

  get closed(): boolean {
    return this.closing !== null;
  }

  resolve(pathOrUrl: string): URL {
    return new URL(pathOrUrl, `${this.baseUrl}/`);
  }

  async fetch(pathOrUrl: string, init: SessionRequestInit = {}): Promise<SessionResponse> {
    if (this.closing) {
      throw new Error('RemoteSession is closed');
    }

    const url = this.resolve(pathOrUrl);
    const headers = new Headers(init.headers);
    if (!headers.has('User-Agent')) {
      headers.set('User-Agent', this.userAgent);
    }
    if (this.authorization && !headers.has('Authorization')) {
      headers.set('Authorization', this.authorization);
    }

    const controller = new AbortController();
    const detach = combineSignals(controller, init.signal);
    let timeout: NodeJS.Timeout | undefined;
    if (this.timeoutMs > 0) {
      timeout = setTimeout(() => {
        controller.abort(new Error(`request timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
    }

    try {
      const response = await fetch(url, {
        method: init.method ?? 'GET',
        headers,
        body: init.body,
        signal: controller.signal,
        dispatcher: this.agent
      });
      const body = new Uint8Array(await response.arrayBuffer());
      return {
        url: url.toString(),
        status: response.status,
        ok: response.ok,
        contentType: response.headers.get('content-type'),
        body
      };
    } finally {
      if (timeout) {
        clearTimeout(timeout);
      }
      detach();
    }
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.agent.close();
    }
    return this.closing;
  }
}
