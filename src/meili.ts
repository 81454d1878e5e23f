/**
 * Meilisearch Management Client
 * Layer: infra
 *
 * Provided ports:
 *   - meili.getHealth
 *   - meili.getTask
 *   - meili.createIndex
 *   - meili.updateSettings
 *   - meili.createDump
 *   - meili.createKey
 *
 * Thin fetch-based client for the engine's management API. Calls return
 * outcome unions instead of throwing.
 */

import type { ApiKey, EnqueuedTask, IndexSettings, KeyRequest, OperationHandle } from './types';
import { FETCH_TIMEOUT_MS } from './types';
import { errorMessage, isARealObject, isStringArray, isStringOrNull } from './utils';
import type { StatusFetcher } from './poller';

// -----------------------------------------------------------------------------
// Outcomes
// -----------------------------------------------------------------------------

export interface MeiliSuccess<T> {
  success: true;
  data: T;
}

export interface MeiliError {
  success: false;
  error: string;
  /** HTTP status, when the engine answered */
  status?: number;
  /** Engine error code (e.g. index_already_exists), when reported */
  code?: string;
  /** The engine answered 2xx with a body that is not JSON */
  malformed?: boolean;
  /** Body text of a malformed response */
  raw_body?: string;
}

export type MeiliOutcome<T> = MeiliSuccess<T> | MeiliError;

export interface HealthResponse {
  status: string;
}

export interface MeiliClientOptions {
  host: string;
  apiKey: string;
  timeoutMs?: number;
}

interface RequestOptions {
  body?: unknown;
  signal?: AbortSignal;
}

// -----------------------------------------------------------------------------
// Client
// -----------------------------------------------------------------------------

export class MeiliClient {
  private readonly host: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;

  constructor(options: MeiliClientOptions) {
    this.host = options.host.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? FETCH_TIMEOUT_MS;
  }

  // --- Port: meili.getHealth ---

  async getHealth(signal?: AbortSignal): Promise<MeiliOutcome<HealthResponse>> {
    const result = await this.request('GET', '/health', { signal });
    if (!result.success) return result;
    if (!isARealObject(result.data) || typeof result.data['status'] !== 'string') {
      return { success: false, error: 'Failed to parse health response' };
    }
    return { success: true, data: { status: result.data['status'] } };
  }

  // --- Port: meili.getTask ---

  /**
   * Returns the raw task JSON. Shape validation is left to the poller so an
   * unexpected payload surfaces as a protocol error rather than a transport one.
   */
  getTask(uid: OperationHandle, signal?: AbortSignal): Promise<MeiliOutcome<unknown>> {
    return this.request('GET', `/tasks/${encodeURIComponent(String(uid))}`, { signal });
  }

  // --- Port: meili.createIndex ---

  async createIndex(uid: string, primaryKey: string): Promise<MeiliOutcome<EnqueuedTask>> {
    const result = await this.request('POST', '/indexes', { body: { uid, primaryKey } });
    return toEnqueuedTask(result);
  }

  // --- Port: meili.updateSettings ---

  async updateSettings(
    indexUid: string,
    settings: IndexSettings,
  ): Promise<MeiliOutcome<EnqueuedTask>> {
    const result = await this.request(
      'PATCH',
      `/indexes/${encodeURIComponent(indexUid)}/settings`,
      { body: settings },
    );
    return toEnqueuedTask(result);
  }

  // --- Port: meili.createDump ---

  async createDump(): Promise<MeiliOutcome<EnqueuedTask>> {
    const result = await this.request('POST', '/dumps');
    return toEnqueuedTask(result);
  }

  // --- Port: meili.createKey ---

  async createKey(request: KeyRequest): Promise<MeiliOutcome<ApiKey>> {
    const result = await this.request('POST', '/keys', { body: request });
    if (!result.success) return result;
    const key = parseKey(result.data);
    if (!key) {
      return { success: false, error: 'Failed to parse key response' };
    }
    return { success: true, data: key };
  }

  // ---------------------------------------------------------------------------
  // Transport
  // ---------------------------------------------------------------------------

  private async request(
    method: 'GET' | 'POST' | 'PATCH',
    path: string,
    options: RequestOptions = {},
  ): Promise<MeiliOutcome<unknown>> {
    // Abort on our own timeout or on the caller's signal, whichever fires first
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const onCallerAbort = (): void => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    const headers: Record<string, string> = {
      Accept: 'application/json',
    };
    if (this.apiKey) {
      headers['Authorization'] = `Bearer ${this.apiKey}`;
    }
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    try {
      const response = await fetch(`${this.host}${path}`, {
        signal: controller.signal,
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
      });

      if (!response.ok) {
        const details = await readErrorDetails(response);
        const statusText = response.statusText || 'Unknown error';
        const error = details.message
          ? `HTTP ${response.status}: ${statusText} - ${details.message}`
          : `HTTP ${response.status}: ${statusText}`;
        return details.code
          ? { success: false, error, status: response.status, code: details.code }
          : { success: false, error, status: response.status };
      }

      const text = await response.text();
      let data: unknown;
      try {
        data = JSON.parse(text);
      } catch (err) {
        return {
          success: false,
          error: `Malformed response body: ${errorMessage(err)}`,
          status: response.status,
          malformed: true,
          raw_body: text,
        };
      }
      return { success: true, data };
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        if (options.signal?.aborted) {
          return { success: false, error: 'Request aborted' };
        }
        return {
          success: false,
          error: `Request timeout: search engine did not respond within ${this.timeoutMs}ms`,
        };
      }

      return {
        success: false,
        error: `Network error: ${errorMessage(err)}`,
      };
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}

// -----------------------------------------------------------------------------
// Poller adapter
// -----------------------------------------------------------------------------

/**
 * Adapts the client's task lookup to the poller's status-fetch port.
 * A 404 marks the task as not found; a non-JSON body keeps its malformed flag.
 */
export function taskStatusFetcher(client: Pick<MeiliClient, 'getTask'>): StatusFetcher {
  return async (handle, signal) => {
    const outcome = await client.getTask(handle, signal);
    if (!outcome.success && outcome.status === 404) {
      return { success: false, error: outcome.error, not_found: true };
    }
    return outcome;
  };
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

interface ErrorDetails {
  message: string | null;
  code: string | null;
}

async function readErrorDetails(response: Response): Promise<ErrorDetails> {
  try {
    const text = (await response.text()).trim();
    if (!text) return { message: null, code: null };
    try {
      const parsed: unknown = JSON.parse(text);
      if (isARealObject(parsed) && typeof parsed['message'] === 'string') {
        const code = typeof parsed['code'] === 'string' ? parsed['code'] : null;
        return { message: parsed['message'], code };
      }
    } catch {
      // Fall back to raw text
    }
    return { message: text, code: null };
  } catch {
    return { message: null, code: null };
  }
}

function toEnqueuedTask(result: MeiliOutcome<unknown>): MeiliOutcome<EnqueuedTask> {
  if (!result.success) return result;
  const task = parseEnqueuedTask(result.data);
  if (!task) {
    return { success: false, error: 'Failed to parse enqueued task response' };
  }
  return { success: true, data: task };
}

/**
 * Parses the summary returned when a task is submitted.
 * Returns null if taskUid is missing.
 */
export function parseEnqueuedTask(raw: unknown): EnqueuedTask | null {
  if (!isARealObject(raw) || typeof raw['taskUid'] !== 'number') {
    return null;
  }
  const indexUid = raw['indexUid'];
  return {
    taskUid: raw['taskUid'],
    indexUid: typeof indexUid === 'string' ? indexUid : null,
    status: typeof raw['status'] === 'string' ? raw['status'] : 'enqueued',
    type: typeof raw['type'] === 'string' ? raw['type'] : 'unknown',
    enqueuedAt: typeof raw['enqueuedAt'] === 'string' ? raw['enqueuedAt'] : '',
  };
}

/**
 * Parses a created API key. Returns null if the key or its scopes are missing.
 */
export function parseKey(raw: unknown): ApiKey | null {
  if (!isARealObject(raw)) {
    return null;
  }
  const { key, uid, description, actions, indexes, expiresAt } = raw;
  if (typeof key !== 'string' || !key) return null;
  if (!isStringArray(actions) || !isStringArray(indexes)) return null;

  return {
    key,
    uid: typeof uid === 'string' ? uid : '',
    description: isStringOrNull(description) ? description : null,
    actions,
    indexes,
    expiresAt: isStringOrNull(expiresAt) ? expiresAt : null,
  };
}
