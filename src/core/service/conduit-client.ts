import { ZodType } from 'zod';
import { TransportException } from '@/core/exceptions';
import { logger } from '@/utils/cli/logger';
import { conduitEnvelopeSchema } from './schemas';
import { FetchFn } from './types';

export interface ConduitClientOptions {
  /** Base URI of the review service, e.g. https://review.example.com */
  uri: string;
  token?: string | null;
  fetch?: FetchFn;
}

/**
 * Minimal JSON-over-HTTP client for the review service API.
 *
 * Each call POSTs form fields `params` (JSON) and `output=json` to
 * `{uri}/api/{method}` and unwraps the `{ result, error_code, error_info }`
 * envelope. Any failure surfaces as a TransportException carrying the
 * service's own message.
 */
export class ConduitClient {
  private readonly endpoint: string;
  private readonly token: string | null;
  private readonly fetchFn: FetchFn;

  constructor(options: ConduitClientOptions) {
    this.endpoint = options.uri.replace(/\/+$/, '');
    this.token = options.token ?? null;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async call<T>(method: string, params: Record<string, unknown>, schema: ZodType<T>): Promise<T> {
    const payload: Record<string, unknown> = { ...params };
    if (this.token) {
      payload['__conduit__'] = { token: this.token };
    }

    const body = new URLSearchParams({
      params: JSON.stringify(payload),
      output: 'json',
    });

    logger.debug(`conduit: ${method}`);

    let response: Response;
    try {
      response = await this.fetchFn(`${this.endpoint}/api/${method}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded; charset=utf-8' },
        body: body.toString(),
      });
    } catch (error) {
      throw new TransportException(
        method,
        `Unable to reach review service at ${this.endpoint}: ${describeError(error)}`,
        null,
        asError(error)
      );
    }

    if (!response.ok) {
      throw new TransportException(
        method,
        `Review service returned HTTP ${response.status} for ${method}`,
        `HTTP-${response.status}`
      );
    }

    let raw: unknown;
    try {
      raw = await response.json();
    } catch (error) {
      throw new TransportException(
        method,
        `Review service returned a malformed response for ${method}`,
        null,
        asError(error)
      );
    }

    const envelope = conduitEnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
      throw new TransportException(method, `Unexpected response envelope for ${method}`);
    }

    const { error_code: errorCode, error_info: errorInfo } = envelope.data;
    if (errorCode) {
      throw new TransportException(method, `${errorCode}: ${errorInfo ?? 'unknown error'}`, errorCode);
    }

    const result = schema.safeParse(envelope.data.result);
    if (!result.success) {
      throw new TransportException(
        method,
        `Unexpected result for ${method}: ${result.error.issues[0]?.message ?? 'invalid shape'}`
      );
    }

    return result.data;
  }
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const asError = (error: unknown): Error | undefined =>
  error instanceof Error ? error : undefined;
