/**
 * Request parsing and error responses shared by the routes
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { ErrorCode, ValidationError, isTrellisError } from '@trellis/core';
import type { PageOptions } from '../query/query-engine.js';
import { createLogger } from '../utils/logger.js';
import type { ServerEnv } from './types.js';

const logger = createLogger('server');

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    details: Record<string, unknown>;
  };
}

function toStatusCode(status: number): ContentfulStatusCode {
  switch (status) {
    case 400:
      return 400;
    case 401:
      return 401;
    case 403:
      return 403;
    case 404:
      return 404;
    case 409:
      return 409;
    case 422:
      return 422;
    case 503:
      return 503;
    default:
      return 500;
  }
}

/**
 * Maps an error to `{ error: { code, message, details } }` with its HTTP status
 */
export function errorResponse(c: Context<ServerEnv>, error: unknown, action: string): Response {
  if (isTrellisError(error)) {
    const status = toStatusCode(error.httpStatus);
    if (status >= 500) {
      logger.error(`${action}: ${error.message}`, error);
    } else {
      logger.debug(`${action}: ${error.code} ${error.message}`);
    }
    const body: ErrorBody = { error: { code: error.code, message: error.message, details: error.details } };
    return c.json(body, status);
  }

  logger.error(`${action}:`, error);
  const body: ErrorBody = { error: { code: 'INTERNAL_ERROR', message: action, details: {} } };
  return c.json(body, 500);
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a JSON object body
 *
 * @throws ValidationError when the body is not a JSON object
 */
export async function readJsonObject(c: Context<ServerEnv>): Promise<Record<string, unknown>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (error) {
    throw new ValidationError('Request body must be valid JSON', ErrorCode.INVALID_INPUT, {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  if (!isJsonObject(body)) {
    throw new ValidationError('Request body must be a JSON object', ErrorCode.INVALID_INPUT, { value: body });
  }
  return body;
}

/**
 * Parses an optional integer query parameter
 */
export function parseIntegerParam(value: string | undefined, field: string): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  if (!/^-?\d+$/.test(value)) {
    throw new ValidationError(`Invalid ${field}: must be an integer`, ErrorCode.INVALID_INPUT, { field, value });
  }
  return parseInt(value, 10);
}

export function parsePageOptions(c: Context<ServerEnv>): PageOptions {
  const offset = parseIntegerParam(c.req.query('offset'), 'offset');
  const limit = parseIntegerParam(c.req.query('limit'), 'limit');
  return {
    ...(offset !== undefined && { offset }),
    ...(limit !== undefined && { limit }),
  };
}

/**
 * Splits a comma-separated query parameter; undefined when absent
 */
export function parseListParam(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function callerOf(c: Context<ServerEnv>): string {
  return c.get('principal').principal;
}
