/**
 * Request pipeline: builders, execution and response modifiers in one call.
 */

import { createConfig } from '../config/index.js';
import type { PipelineConfig } from '../config/index.js';
import { loadResponse } from '../execution/loader.js';
import type { RequestLoader } from '../execution/loader.js';
import type { Response } from '../execution/response.js';
import { HttpHeader } from '../http/header.js';
import { applyRequestBuilders, DefaultHeaderBuilder } from '../modifiers/request-builder.js';
import type { RequestBuilder } from '../modifiers/request-builder.js';
import { applyResponseModifiers } from '../modifiers/response-modifier.js';
import type { ResponseModifier } from '../modifiers/response-modifier.js';
import { ConsoleLogger } from '../observability/logging.js';
import type { Logger } from '../observability/logging.js';
import { RequestDescription } from '../request/description.js';
import type { RequestDescriptionInit } from '../request/description.js';
import { rawMethod } from '../request/requestable.js';
import type { MutableRequestable, Requestable } from '../request/requestable.js';
import { UndiciRequestLoader } from '../transport/index.js';
import type { DataResponse } from '../types/responses.js';

/**
 * Options for {@link RequestPipeline}.
 */
export interface RequestPipelineOptions<T> {
  loader: RequestLoader<T>;
  /** Applied in order before each execution. */
  builders?: readonly RequestBuilder[];
  /** Applied in order after each execution. */
  modifiers?: readonly ResponseModifier<T>[];
  logger?: Logger;
  /** Validated on construction; defaults fill missing fields. */
  config?: Partial<PipelineConfig>;
  /** Prepend a builder that adds `config.userAgent` when no User-Agent is set. */
  defaultUserAgent?: boolean;
}

/**
 * Runs descriptions through a fixed chain: request builders, then one
 * execution timed by {@link loadResponse}, then response modifiers.
 *
 * The pipeline keeps no per-request state, so one instance serves any number
 * of concurrent sends.
 *
 * @example
 * ```typescript
 * const pipeline = RequestPipeline.withDefaults({
 *   builders: [new BearerAuthBuilder('test-token')],
 *   modifiers: [new LoggingResponseModifier(logger)],
 * });
 *
 * const response = await pipeline.send(pipeline.describe({ baseURLString: 'https://example.com/items' }));
 * ```
 */
export class RequestPipeline<T = DataResponse> {
  readonly config: PipelineConfig;
  private readonly loader: RequestLoader<T>;
  private readonly builders: readonly RequestBuilder[];
  private readonly modifiers: readonly ResponseModifier<T>[];
  private readonly logger: Logger;

  constructor(options: RequestPipelineOptions<T>) {
    this.config = createConfig(options.config);
    this.loader = options.loader;
    this.logger = (options.logger ?? new ConsoleLogger({ level: this.config.logLevel })).child({
      component: 'request-pipeline',
    });

    const defaults =
      options.defaultUserAgent === false
        ? []
        : [new DefaultHeaderBuilder(HttpHeader.userAgent(this.config.userAgent))];
    this.builders = [...defaults, ...(options.builders ?? [])];
    this.modifiers = [...(options.modifiers ?? [])];
  }

  /**
   * Pipeline sending through undici with the configured timeout.
   */
  static withDefaults(
    options: Omit<RequestPipelineOptions<DataResponse>, 'loader'> = {}
  ): RequestPipeline<DataResponse> {
    const config = createConfig(options.config);
    return new RequestPipeline<DataResponse>({
      ...options,
      config,
      loader: new UndiciRequestLoader({ timeout: config.timeout }),
    });
  }

  /**
   * Starts a description that falls back to this pipeline's base URL.
   */
  describe(init: RequestDescriptionInit = {}): RequestDescription {
    return new RequestDescription({ defaultBaseUrl: this.config.defaultBaseUrl, ...init });
  }

  /**
   * Applies the builders to `request` without executing it.
   */
  prepare(request: MutableRequestable): MutableRequestable {
    return applyRequestBuilders(request, this.builders);
  }

  /**
   * Builds, executes and post-processes `request`.
   *
   * Failures from building or from the loader are logged and rethrown as-is.
   */
  async send(request: MutableRequestable): Promise<Response<MutableRequestable, T>> {
    return this.execute(this.prepare(request));
  }

  /**
   * Executes `request` as given, skipping the builders. Suits requests that
   * are already transport-ready.
   */
  async execute<R extends Requestable>(request: R): Promise<Response<R, T>> {
    const method = rawMethod(request);
    this.logger.debug('Executing request', { method });

    let response: Response<R, T>;
    try {
      response = await loadResponse(this.loader, request);
    } catch (error) {
      this.logger.error(
        'Request failed',
        error instanceof Error ? error : undefined,
        { method }
      );
      throw error;
    }

    this.logger.debug('Request completed', {
      method,
      durationMs: response.metrics.durationMs,
    });
    return applyResponseModifiers(response, this.modifiers);
  }
}
