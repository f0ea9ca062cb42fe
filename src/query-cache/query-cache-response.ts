/**
 * TCP response envelope.
 * Handlers never throw across the transport; failures become error bodies.
 */

import { Logger } from '@nestjs/common';
import { ClassConstructor } from 'class-transformer';
import {
  QueryCacheError,
  QueryCacheErrorKind,
  describeError,
} from '../common/errors/query-cache.errors';
import { RecordCodec } from '../cache/tiers/record-codec';

export interface ErrorBody {
  kind: QueryCacheErrorKind;
  message: string;
  suggestion?: string;
}

export type SuccessResponse<T extends object> = { success: true } & T;

export interface FailureResponse {
  success: false;
  error: ErrorBody;
}

export type QueryCacheResponse<T extends object> = SuccessResponse<T> | FailureResponse;

/**
 * Errors without a kind come from collaborators that were not wrapped
 */
export function toErrorBody(error: unknown): ErrorBody {
  if (error instanceof QueryCacheError) {
    return error.suggestion === undefined
      ? { kind: error.kind, message: error.message }
      : { kind: error.kind, message: error.message, suggestion: error.suggestion };
  }
  return { kind: QueryCacheErrorKind.COMPUTE, message: describeError(error) };
}

export async function respond<T extends object>(
  logger: Logger,
  cmd: string,
  handler: () => Promise<T>,
): Promise<QueryCacheResponse<T>> {
  try {
    const result = await handler();
    return { success: true, ...result };
  } catch (error) {
    const body = toErrorBody(error);
    if (body.kind === QueryCacheErrorKind.COMPUTE) {
      logger.error(
        `TCP ${cmd} failed: ${body.message}`,
        error instanceof Error ? error.stack : undefined,
      );
    } else {
      logger.warn(`TCP ${cmd} rejected: kind=${body.kind} message=${body.message}`);
    }
    return { success: false, error: body };
  }
}

/**
 * Validate a TCP payload against its DTO class
 */
export function parsePayload<T extends object>(dtoClass: ClassConstructor<T>, payload: unknown): T {
  return new RecordCodec(dtoClass, `${dtoClass.name} payload`).fromPlain(payload);
}
