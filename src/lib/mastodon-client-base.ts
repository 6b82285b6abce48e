import { ApiError, DecodeError, ScoutError, TransportError, describeError } from './errors.js';
import { type JsonRecord, isRecord } from './fields.js';
import { DEFAULT_INSTANCE_URL, DEFAULT_TIMEOUT_SECONDS } from './mastodon-client-constants.js';
import type { ClientFailure } from './mastodon-client-types.js';

// biome-ignore lint/suspicious/noExplicitAny: TS mixin constructor requirement.
export type AbstractConstructor<T = object> = abstract new (...args: any[]) => T;
export type Mixin<TBase extends AbstractConstructor<MastodonClientBase>, TAdded> = TBase & AbstractConstructor<TAdded>;

export interface MastodonClientOptions {
  accessToken: string;
  instanceUrl?: string;
  /** Overall deadline for one command, covering every request it makes. */
  timeoutMs?: number;
  debug?: boolean;
}

export abstract class MastodonClientBase {
  protected readonly instanceUrl: string;
  protected readonly timeoutMs: number;
  protected readonly debug: boolean;
  private readonly accessToken: string;

  constructor(options: MastodonClientOptions) {
    if (!options.accessToken) {
      throw new Error('An access token is required');
    }
    this.accessToken = options.accessToken;
    this.instanceUrl = (options.instanceUrl ?? DEFAULT_INSTANCE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_SECONDS * 1000;
    this.debug = options.debug ?? process.env.MASTODON_SCOUT_DEBUG === '1';
  }

  protected getHeaders(): Record<string, string> {
    return {
      authorization: `Bearer ${this.accessToken}`,
      accept: 'application/json',
    };
  }

  /**
   * Run one command under a single deadline. Scout errors become a failed
   * result; anything else is a bug and propagates.
   */
  protected async withDeadline<T extends { success: true }>(
    task: (signal: AbortSignal) => Promise<T>,
  ): Promise<T | ClientFailure> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      return await task(controller.signal);
    } catch (error) {
      if (error instanceof ScoutError) {
        if (this.debug) {
          console.error(`[request] ${error.message}`);
        }
        return { success: false, error };
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  protected async getJson(path: string, signal: AbortSignal): Promise<unknown> {
    const url = `${this.instanceUrl}${path}`;
    if (this.debug) {
      console.error(`[request] GET ${url}`);
    }

    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const response = await fetch(url, { method: 'GET', headers: this.getHeaders(), signal });
      status = response.status;
      ok = response.ok;
      text = await response.text();
    } catch (error) {
      if (signal.aborted) {
        throw new TransportError(`request timed out after ${this.formatTimeout()}`, { cause: error });
      }
      throw new TransportError(`making request: ${describeError(error)}`, { cause: error });
    }

    if (!ok) {
      throw new ApiError(status, text);
    }

    try {
      return JSON.parse(text) as unknown;
    } catch (error) {
      throw new DecodeError(describeError(error), { cause: error });
    }
  }

  protected async getArray(path: string, signal: AbortSignal): Promise<unknown[]> {
    const body = await this.getJson(path, signal);
    if (!Array.isArray(body)) {
      throw new DecodeError(`expected an array, got ${describeJsonType(body)}`);
    }
    return body;
  }

  protected async getRecord(path: string, signal: AbortSignal): Promise<JsonRecord> {
    const body = await this.getJson(path, signal);
    if (!isRecord(body)) {
      throw new DecodeError(`expected an object, got ${describeJsonType(body)}`);
    }
    return body;
  }

  private formatTimeout(): string {
    return this.timeoutMs % 1000 === 0 ? `${this.timeoutMs / 1000}s` : `${this.timeoutMs}ms`;
  }
}

function describeJsonType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
}
