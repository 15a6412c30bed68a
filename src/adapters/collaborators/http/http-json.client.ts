import { Logger } from '@nestjs/common';
import { CallOptions, DownstreamError, isRetryableStatus } from '../../../core';

export interface HttpJsonClientConfig {
  baseUrl: string;
  apiKey?: string;
  /**
   * Name used in errors and logs
   */
  name: string;
}

/**
 * Minimal JSON-over-HTTP client for collaborator APIs.
 * Non-2xx responses become DownstreamError; 408, 429 and 5xx are retryable.
 */
export class HttpJsonClient {
  private readonly logger: Logger;

  constructor(private readonly config: HttpJsonClientConfig) {
    this.logger = new Logger(`HttpJsonClient:${config.name}`);
  }

  async post(path: string, body: unknown, options: CallOptions = {}): Promise<unknown> {
    const operation = `${this.config.name} POST ${path}`;

    let response: Response;
    try {
      response = await fetch(`${this.config.baseUrl}${path}`, {
        method: 'POST',
        headers: {
          ...(this.config.apiKey ? { Authorization: `Bearer ${this.config.apiKey}` } : {}),
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
        signal: options.signal,
      });
    } catch (error) {
      throw new DownstreamError(
        `${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
        operation,
        true,
      );
    }

    if (!response.ok) {
      this.logger.warn(`${operation} returned ${response.status}`);
      throw new DownstreamError(
        `${operation} returned ${response.status} ${response.statusText}`,
        operation,
        isRetryableStatus(response.status),
        response.status,
      );
    }

    try {
      return await response.json();
    } catch {
      throw new DownstreamError(`${operation} returned invalid JSON`, operation, true, response.status);
    }
  }
}
