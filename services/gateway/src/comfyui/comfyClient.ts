import type { Histogram } from 'prom-client';

import { responseText, type RemoteSession, type SessionResponse } from '../http/remoteSession';
import { fail, isJsonObject, ok, parseJson, type JsonValue, type Outcome } from './json';
import type {
  ComfyLogger,
  MissingRunIdentifierFailure,
  PromptSubmission,
  RemoteServiceCategory,
  RemoteServiceFailure,
  WorkflowGraph
} from './types';

export type ComfyHttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface ComfyRequestOptions {
  method?: ComfyHttpMethod;
  body?: JsonValue;
  signal?: AbortSignal;
}

export interface ComfyClientOptions {
  session: RemoteSession;
  logger: ComfyLogger;
  requestDuration?: Histogram<'method' | 'outcome'>;
}

function remoteFailure(
  category: RemoteServiceCategory,
  message: string,
  statusCode: number | null,
  body: string | null
): RemoteServiceFailure {
  return { kind: 'remote_service', category, statusCode, body, message };
}

function describeTransportError(err: unknown): string {
  if (!(err instanceof Error)) {
    return String(err);
  }
  const cause: unknown = err.cause;
  if (cause instanceof Error && cause.message && cause.message !== err.message) {
    return `${err.message} (${cause.message})`;
  }
  return err.message;
}

/**
 * Maps an HTTP error status from the workflow engine onto the gateway's failure taxonomy.
 */
export function classifyErrorStatus(statusCode: number, body: string): RemoteServiceFailure {
  switch (statusCode) {
    case 401:
      return remoteFailure('unauthorized', 'Authentication failed for ComfyUI API', statusCode, body);
    case 403:
      return remoteFailure('forbidden', 'Forbidden access to ComfyUI API', statusCode, body);
    case 404:
      return remoteFailure('not_found', 'ComfyUI API endpoint not found', statusCode, body);
    default:
      return remoteFailure('internal', `ComfyUI API error: ${body}`, statusCode, body);
  }
}

/**
 * Client for the workflow engine's HTTP API, sharing one {@link RemoteSession}.
 */
export class ComfyClient {
  private readonly session: RemoteSession;
  private readonly logger: ComfyLogger;
  private readonly requestDuration?: Histogram<'method' | 'outcome'>;

  constructor(options: ComfyClientOptions) {
    this.session = options.session;
    this.logger = options.logger;
    this.requestDuration = options.requestDuration;
  }

  get baseUrl(): string {
    return this.session.baseUrl;
  }

  async request(path: string, options: ComfyRequestOptions = {}): Promise<Outcome<JsonValue, RemoteServiceFailure>> {
    const method = options.method ?? 'GET';
    const exchanged = await this.exchange(path, method, options);
    if (!exchanged.ok) {
      return exchanged;
    }

    const text = responseText(exchanged.value);
    const parsed = parseJson(text);
    if (!parsed.ok) {
      this.logger.error({ path, method, err: parsed.error }, 'ComfyUI API returned a non-JSON body');
      return fail(remoteFailure('internal', `ComfyUI API error: invalid JSON response (${parsed.error})`, exchanged.value.status, text));
    }
    return ok(parsed.value);
  }

  async submitPrompt(
    graph: WorkflowGraph,
    clientId: string,
    signal?: AbortSignal
  ): Promise<Outcome<PromptSubmission, RemoteServiceFailure | MissingRunIdentifierFailure>> {
    const result = await this.request('/prompt', {
      method: 'POST',
      body: { prompt: graph, client_id: clientId },
      signal
    });
    if (!result.ok) {
      return result;
    }

    const response = result.value;
    if (!isJsonObject(response) || typeof response.prompt_id !== 'string' || response.prompt_id.length === 0) {
      return fail({
        kind: 'missing_run_identifier',
        response,
        message: 'ComfyUI did not return a prompt_id'
      });
    }

    return ok({ promptId: response.prompt_id, response });
  }

  async fetchHistory(promptId: string, signal?: AbortSignal): Promise<Outcome<JsonValue, RemoteServiceFailure>> {
    return this.request(`/history/${encodeURIComponent(promptId)}`, { method: 'GET', signal });
  }

  /**
   * Downloads raw bytes, e.g. an artifact reference produced by the result locator.
   */
  async download(reference: string, signal?: AbortSignal): Promise<Outcome<Uint8Array, RemoteServiceFailure>> {
    const exchanged = await this.exchange(reference, 'GET', { signal });
    if (!exchanged.ok) {
      return exchanged;
    }
    return ok(exchanged.value.body);
  }

  private async exchange(
    path: string,
    method: ComfyHttpMethod,
    options: ComfyRequestOptions
  ): Promise<Outcome<SessionResponse, RemoteServiceFailure>> {
    const stopTimer = this.requestDuration?.startTimer({ method });
    const headers: Record<string, string> = { Accept: 'application/json' };
    let body: string | undefined;
    if (options.body !== undefined) {
      body = JSON.stringify(options.body);
      headers['Content-Type'] = 'application/json';
    }

    let response: SessionResponse;
    try {
      response = await this.session.fetch(path, { method, headers, body, signal: options.signal });
    } catch (err) {
      const detail = describeTransportError(err);
      this.logger.error({ path, method, err }, 'ComfyUI API request failed');
      stopTimer?.({ outcome: 'unavailable' });
      return fail(remoteFailure('unavailable', `ComfyUI service unavailable: ${detail}`, null, null));
    }

    if (response.status >= 400) {
      const text = responseText(response);
      const failure = classifyErrorStatus(response.status, text);
      this.logger.error({ path, method, statusCode: response.status, body: text }, `ComfyUI API error (${response.status})`);
      stopTimer?.({ outcome: failure.category });
      return fail(failure);
    }

    stopTimer?.({ outcome: 'success' });
    return ok(response);
  }
}
