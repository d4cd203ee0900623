import type { z } from 'zod';
import { MalformedResponseError, TransportError, toError } from '@/lib/errors/SyncErrors';
import { ServerErrorBodySchema, describeIssues, safeParse } from '@/lib/validation/schemas';
import { NETWORK } from '@/config/constants';
import { Logger } from '@/lib/logger/Logger';

const logger = new Logger('LookupRequest');

/**
 * Subset of the fetch Response the transport reads
 */
export interface LookupResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<LookupResponse>;

export interface LookupRequestOptions {
  /** Origin the endpoint paths are resolved against (defaults to the page origin) */
  baseUrl?: string;
  /** Request timeout (ms) */
  timeoutMs?: number;
  customFetch?: FetchLike;
}

/**
 * Handles read-only JSON GET requests to the admin lookup endpoints
 */
export class LookupRequest {
  private fetchFn: FetchLike;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(options: LookupRequestOptions = {}) {
    this.fetchFn = options.customFetch ?? ((url, init) => fetch(url, init));
    this.baseUrl = options.baseUrl ?? window.location.origin;
    this.timeoutMs = options.timeoutMs ?? NETWORK.REQUEST_TIMEOUT_MS;
  }

  /**
   * GET a JSON document and validate it against a schema
   * @param path - Endpoint path or absolute URL
   * @param query - Query string parameters
   * @param schema - Expected payload shape
   */
  async get<T extends z.ZodTypeAny>(
    path: string,
    query: Record<string, string>,
    schema: T
  ): Promise<z.infer<T>> {
    const url = this.buildRequestUrl(path, query);
    logger.debug('Starting request:', url);

    let response: LookupResponse;
    let body: string;
    try {
      ({ response, body } = await this.fetchWithTimeout(url, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
          'X-Requested-With': 'XMLHttpRequest',
        },
        credentials: 'same-origin',
      }));
    } catch (error) {
      if (error instanceof TransportError) throw error;
      logger.warn('Request failed:', error);
      throw new TransportError('Network request failed', undefined, undefined, toError(error));
    }

    logger.debug(`Response received: ${response.status} ${response.statusText}`);

    // Check HTTP status
    if (!response.ok) {
      logger.error('HTTP error:', response.status, response.statusText);
      throw new TransportError(
        `HTTP error! status: ${response.status}`,
        response.status,
        response.status === NETWORK.DETAILED_ERROR_STATUS ? this.extractErrorDetail(body) : undefined
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (error) {
      throw new MalformedResponseError('Response is not valid JSON', toError(error));
    }

    const parsed = safeParse(schema, payload);
    if (!parsed.success) {
      logger.warn('Unexpected payload:', parsed.error.issues);
      throw new MalformedResponseError(`Unexpected payload: ${describeIssues(parsed.error)}`);
    }

    logger.debug('Request completed successfully:', url);
    return parsed.data;
  }

  /**
   * Fetch and read the body under one deadline; a server that sends its
   * headers and then stalls times out like one that never answers
   */
  private async fetchWithTimeout(
    url: string,
    options: RequestInit
  ): Promise<{ response: LookupResponse; body: string }> {
    const controller = new AbortController();
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(new TransportError(`Request timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
    });

    try {
      const response = await Promise.race([
        this.fetchFn(url, { ...options, signal: controller.signal }),
        deadline,
      ]);
      const body = await Promise.race([this.readBody(response), deadline]);
      if (controller.signal.aborted) {
        throw new TransportError(`Request timed out after ${this.timeoutMs}ms`);
      }
      return { response, body };
    } catch (error) {
      if (controller.signal.aborted) {
        logger.error('Request timed out after', this.timeoutMs, 'ms');
        throw error instanceof TransportError
          ? error
          : new TransportError(`Request timed out after ${this.timeoutMs}ms`, undefined, undefined, toError(error));
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Read the body as text; an unreadable body counts as empty
   */
  private async readBody(response: LookupResponse): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      logger.warn('Could not read response body:', error);
      return '';
    }
  }

  /**
   * Pull `{ "error": "..." }` out of an error body, if it is there
   */
  private extractErrorDetail(body: string): string | undefined {
    try {
      const parsed = ServerErrorBodySchema.safeParse(JSON.parse(body));
      return parsed.success ? parsed.data.error : undefined;
    } catch {
      // Not JSON: the generic message is shown
      return undefined;
    }
  }

  /**
   * Build request URL
   */
  private buildRequestUrl(path: string, query: Record<string, string>): string {
    let url: URL;
    try {
      url = new URL(path, this.baseUrl);
    } catch (error) {
      logger.error('Error constructing URL:', error);
      throw new TransportError(`Invalid endpoint URL: ${path}`);
    }
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }
    return url.href;
  }
}
