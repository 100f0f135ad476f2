/**
 * Thin JSON client over fetch with a per-request timeout, read retries and
 * zod-validated responses
 */

import { z } from 'zod';
import { RemoteOperationError } from './errors';
import { logger } from './logger';
import { withRetry } from './retry';

export interface RestClientOptions {
  /** Name used in error messages, e.g. "Jira" */
  system: string;
  baseUrl: string;
  headers: Record<string, string>;
  timeoutMs: number;
  retries: number;
  retryDelayMs?: number;
}

export interface RequestOptions {
  method?: 'GET' | 'POST' | 'PATCH';
  body?: unknown;
  contentType?: string;
  /** Retry transient failures; only enabled for reads */
  retry?: boolean;
}

/**
 * Read the body as text, giving up as soon as the signal aborts
 */
function readText(response: Response, signal: AbortSignal): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    void response.text().then(
      (text) => {
        signal.removeEventListener('abort', onAbort);
        resolve(text);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

async function safeReadBody(response: Response, signal: AbortSignal): Promise<string | undefined> {
  try {
    const text = await readText(response, signal);
    return text || undefined;
  } catch (error) {
    logger.debug(`Could not read error response body: ${String(error)}`);
    return undefined;
  }
}

export class RestClient {
  constructor(private readonly options: RestClientOptions) {}

  async request<S extends z.ZodTypeAny>(path: string, schema: S, init: RequestOptions = {}): Promise<z.infer<S>> {
    const method = init.method ?? 'GET';
    const operation = `${this.options.system} ${method} ${path}`;

    const call = async (): Promise<unknown> => this.send(path, method, operation, init);
    const raw = init.retry
      ? await withRetry(call, {
          label: operation,
          retries: this.options.retries,
          baseDelayMs: this.options.retryDelayMs,
          shouldRetry: (error) => error instanceof RemoteOperationError && error.isTransient,
        })
      : await call();

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new RemoteOperationError({
        operation,
        message: `${operation} returned an unexpected response (${issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid'})`,
      });
    }
    return parsed.data;
  }

  private async send(path: string, method: string, operation: string, init: RequestOptions): Promise<unknown> {
    const url = `${this.options.baseUrl}${path}`;
    const headers = new Headers(this.options.headers);
    headers.set('Accept', 'application/json');
    if (init.body !== undefined) {
      headers.set('Content-Type', init.contentType ?? 'application/json');
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);

    const timeoutError = (cause: unknown): RemoteOperationError =>
      new RemoteOperationError({ operation, message: `${operation} timed out after ${this.options.timeoutMs}ms`, cause });

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          method,
          headers,
          body: init.body === undefined ? undefined : JSON.stringify(init.body),
          signal: controller.signal,
        });
      } catch (error) {
        if (timedOut || (error instanceof Error && error.name === 'AbortError')) {
          throw timeoutError(error);
        }
        throw new RemoteOperationError({
          operation,
          message: `${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
          cause: error,
        });
      }

      if (!response.ok) {
        throw new RemoteOperationError({
          operation,
          message: `${operation} failed with ${response.status} ${response.statusText}`.trim(),
          status: response.status,
          responseText: await safeReadBody(response, controller.signal),
        });
      }

      let text: string;
      try {
        text = await readText(response, controller.signal);
      } catch (error) {
        if (timedOut) {
          throw timeoutError(error);
        }
        throw new RemoteOperationError({
          operation,
          message: `${operation} failed while reading the response: ${error instanceof Error ? error.message : String(error)}`,
          status: response.status,
          cause: error,
        });
      }

      if (!text) {
        return undefined;
      }
      try {
        return JSON.parse(text);
      } catch (error) {
        throw new RemoteOperationError({
          operation,
          message: `${operation} returned a body that is not JSON`,
          status: response.status,
          responseText: text.slice(0, 500),
          cause: error,
        });
      }
    } finally {
      clearTimeout(timeout);
    }
  }
}
