/**
 * Request Router
 *
 * Per-request path through an endpoint:
 *
 *   received -> validated -> version-resolved -> model-ready -> predicted -> responded
 *
 * Error exits exist at validation, version resolution (not found / signature
 * mismatch / load failure) and prediction. The router keeps no state between
 * calls; the endpoint's version cache is the only shared structure it touches.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { Err, Ok, type Result } from 'ts-results';
import { PredictionError, toRoutingError, type RoutingError } from '../api/errors.js';
import type { EndpointDescriptor, ServeResponse } from '../types/endpoint.js';
import type { FieldRecord, VersionHandle, VersionId } from '../types/models.js';
import { lazyLog } from '../utils/logger.js';
import type { WireRecord } from './schema-translator.js';

export type RequestPhase =
  | 'received'
  | 'validated'
  | 'version-resolved'
  | 'model-ready'
  | 'predicted'
  | 'responded';

export interface HandleOptions {
  /** Aborts waiting for the version; a shared load continues for others */
  signal?: AbortSignal;
  /** Correlates log lines; generated when absent */
  requestId?: string;
}

export type RouteResult = Result<ServeResponse, RoutingError>;

/**
 * Resolve the version a request asks for.
 *
 * Absent, empty or whitespace-only selectors fall back to the default.
 */
export function resolveVersion(requested: string | undefined, defaultVersion: VersionId): VersionId {
  const trimmed = requested?.trim();
  return trimmed !== undefined && trimmed.length > 0 ? trimmed : defaultVersion;
}

export class RequestRouter {
  private readonly endpoint: EndpointDescriptor;
  private readonly logger?: Logger;

  constructor(endpoint: EndpointDescriptor, logger?: Logger) {
    this.endpoint = endpoint;
    this.logger = logger;
  }

  /**
   * Serve one request.
   *
   * Never throws: every failure is mapped to a `RoutingError` whose message
   * carries no internal detail. The full error is logged.
   */
  public async handle(
    rawRequest: unknown,
    requestedVersionId?: string,
    options: HandleOptions = {}
  ): Promise<RouteResult> {
    const requestId = options.requestId ?? randomUUID();
    const versionId = resolveVersion(requestedVersionId, this.endpoint.defaultVersion);
    this.trace(requestId, 'received', versionId);

    let input: FieldRecord;
    let handle: VersionHandle;
    try {
      input = this.endpoint.contract.parseRequest(rawRequest);
      this.trace(requestId, 'validated', versionId);

      handle = await this.endpoint.cache.get(versionId, { signal: options.signal });
      this.trace(requestId, 'version-resolved', versionId);
      this.trace(requestId, 'model-ready', versionId);
    } catch (error) {
      return this.fail(requestId, versionId, error);
    }

    let predictions: WireRecord[];
    try {
      predictions = await this.predict(handle, input);
      this.trace(requestId, 'predicted', versionId);
    } catch (error) {
      return this.fail(requestId, versionId, error);
    }

    this.trace(requestId, 'responded', versionId);
    return Ok({
      model: this.endpoint.modelName,
      version: versionId,
      predictions,
    });
  }

  private async predict(handle: VersionHandle, input: FieldRecord): Promise<WireRecord[]> {
    const batch = [input];

    let raw: unknown;
    try {
      raw = await handle.predict(batch);
    } catch (error) {
      throw new PredictionError(handle.versionId, `Predict failed for version '${handle.versionId}'`, error);
    }

    let predictions: WireRecord[];
    try {
      predictions = this.endpoint.contract.formatResponse(raw);
    } catch (error) {
      throw new PredictionError(
        handle.versionId,
        `Version '${handle.versionId}' returned output that does not match the response contract`,
        error
      );
    }

    // One output row per input row
    if (predictions.length !== batch.length) {
      throw new PredictionError(
        handle.versionId,
        `Version '${handle.versionId}' returned ${predictions.length} rows for a batch of ${batch.length}`
      );
    }

    return predictions;
  }

  private fail(requestId: string, versionId: VersionId, error: unknown): RouteResult {
    const routingError = toRoutingError(error, versionId);
    const level = routingError.status >= 500 ? 'error' : 'warn';

    this.logger?.[level](
      {
        requestId,
        modelName: this.endpoint.modelName,
        versionId,
        status: routingError.status,
        code: routingError.code,
        err: error,
      },
      'Request failed'
    );

    return Err(routingError);
  }

  private trace(requestId: string, phase: RequestPhase, versionId: VersionId): void {
    lazyLog(this.logger, 'debug', () => ({ requestId, phase, versionId }), 'Request phase');
  }
}
