import { ZodError } from 'zod';

import type { ComfyFailure, RemoteServiceCategory } from './comfyui/types';

export type GatewayErrorCode =
  | 'TODO_NOT_FOUND'
  | 'MISSING_PRINCIPAL'
  | 'INVALID_IMAGE'
  | 'STORAGE_UPLOAD_FAILED'
  | 'TODO_PERSISTENCE_FAILED'
  | 'INVALID_IMAGE_REQUEST'
  | 'IMAGE_AI_UNAVAILABLE'
  | 'IMAGE_AI_FAILED';

export class GatewayError extends Error {
  public readonly code: GatewayErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: GatewayErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = 'GatewayError';
    this.code = code;
    this.details = details;
  }
}

export interface ErrorResponse {
  statusCode: number;
  detail: string;
  errors?: unknown;
}

export const UNEXPECTED_ERROR_DETAIL = 'An unexpected error occurred. Please try again later.';

const GATEWAY_ERROR_STATUS: Record<GatewayErrorCode, number> = {
  TODO_NOT_FOUND: 404,
  MISSING_PRINCIPAL: 401,
  INVALID_IMAGE: 400,
  STORAGE_UPLOAD_FAILED: 500,
  TODO_PERSISTENCE_FAILED: 500,
  INVALID_IMAGE_REQUEST: 400,
  IMAGE_AI_UNAVAILABLE: 503,
  IMAGE_AI_FAILED: 502
};

// Server-side codes whose message is safe to return as the detail.
const EXPOSED_SERVER_CODES: ReadonlySet<GatewayErrorCode> = new Set([
  'STORAGE_UPLOAD_FAILED',
  'IMAGE_AI_UNAVAILABLE',
  'IMAGE_AI_FAILED'
]);

const REMOTE_CATEGORY_STATUS: Record<RemoteServiceCategory, number> = {
  unavailable: 503,
  unauthorized: 401,
  forbidden: 403,
  not_found: 404,
  internal: 500
};

export function assertUnreachable(value: never): never {
  throw new Error(`Unhandled value: ${JSON.stringify(value)}`);
}

export const mapComfyFailure = (failure: ComfyFailure): ErrorResponse => {
  switch (failure.kind) {
    case 'template_fetch':
    case 'structural_patch':
    case 'result_locator':
      return { statusCode: 400, detail: failure.message };
    case 'remote_service':
      return { statusCode: REMOTE_CATEGORY_STATUS[failure.category], detail: failure.message };
    case 'missing_run_identifier':
    case 'relay':
      return { statusCode: 500, detail: failure.message };
    default:
      return assertUnreachable(failure);
  }
};

function clientErrorStatus(error: unknown): number | null {
  if (!(error instanceof Error) || !('statusCode' in error)) {
    return null;
  }
  const statusCode = error.statusCode;
  if (typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500) {
    return statusCode;
  }
  return null;
}

export const mapErrorToResponse = (error: unknown): ErrorResponse => {
  if (error instanceof GatewayError) {
    const statusCode = GATEWAY_ERROR_STATUS[error.code];
    return {
      statusCode,
      detail: statusCode >= 500 && !EXPOSED_SERVER_CODES.has(error.code) ? UNEXPECTED_ERROR_DETAIL : error.message
    };
  }

  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      detail: 'Request validation failed',
      errors: error.flatten()
    };
  }

  const clientStatus = clientErrorStatus(error);
  if (clientStatus !== null && error instanceof Error) {
    return { statusCode: clientStatus, detail: error.message };
  }

  return {
    statusCode: 500,
    detail: UNEXPECTED_ERROR_DETAIL
  };
};

export const toErrorBody = (mapped: ErrorResponse): { detail: string; errors?: unknown } =>
  mapped.errors === undefined ? { detail: mapped.detail } : { detail: mapped.detail, errors: mapped.errors };
