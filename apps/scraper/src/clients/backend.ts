import { ResultAsync, errAsync, okAsync } from 'neverthrow';
import type { LakeId } from '../core/branded-types.js';
import { ErrorCode, type ScraperError, createError } from '../core/errors.js';
import type { BackendResponse, ForwardResult, WaterReading } from '../core/types.js';
import { type HttpFetch, isTransportError } from '../lib/http-utils.js';
import type { Logger } from '../lib/logger.js';
import { describeError } from '../lib/result.js';

export interface BackendClientOptions {
  baseUrl: string;
  pathTemplate: string;
  lakeId: LakeId;
  apiKey: string;
  timeoutMs: number;
  fetch: HttpFetch;
  logger: Logger;
}

export const buildBackendUrl = (baseUrl: string, pathTemplate: string, lakeId: LakeId): string =>
  [baseUrl, pathTemplate.replace('{}', lakeId)].join('/');

export class BackendClient {
  private readonly url: string;

  constructor(private readonly options: BackendClientOptions) {
    this.url = buildBackendUrl(options.baseUrl, options.pathTemplate, options.lakeId);
  }

  /**
   * PUTs the reading to the backend.
   *
   * Readings at or below zero are held back for manual approval without touching the network.
   * When the backend cannot be reached the result carries no response; any HTTP answer is
   * passed on for the caller to judge.
   */
  forwardReading(reading: WaterReading): ResultAsync<ForwardResult, ScraperError> {
    if (!Number.isFinite(reading.temperature) || reading.temperature <= 0) {
      return errAsync(
        createError(
          ErrorCode.ValidationError,
          `Water temperature is ${reading.temperature} (<= 0), manual approval needed`,
          { reading }
        )
      );
    }

    const { logger } = this.options;
    const url = this.url;
    const data = { temperature: reading.temperature, time: reading.time };
    logger.debug({ data, url }, 'Sending reading to backend');

    return ResultAsync.fromPromise(this.put(data), (error) => error)
      .map((response): ForwardResult => {
        logger.debug(
          { ok: response.ok, status: response.status, content: response.body },
          'Backend answered'
        );
        return { response, url };
      })
      .orElse((error): ResultAsync<ForwardResult, ScraperError> => {
        if (isTransportError(error)) {
          logger.error({ err: error, url }, `Error while connecting to backend (${url})`);
          return okAsync({ url });
        }
        return errAsync(
          createError(ErrorCode.InternalError, `Backend request failed: ${describeError(error)}`, {
            url,
          })
        );
      });
  }

  private async put(data: Record<string, unknown>): Promise<BackendResponse> {
    const res = await this.options.fetch(this.url, {
      method: 'PUT',
      headers: {
        Authorization: `Bearer ${this.options.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(data),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    return { ok: res.ok, status: res.status, body: await res.text() };
  }
}
