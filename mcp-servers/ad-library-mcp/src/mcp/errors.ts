import { ZodError } from 'zod';
import { InvalidInputError } from '../cache/errors.js';
import { ConfigurationError, CreditExhaustedError, RateLimitError } from '../clients/errors.js';
import { UnknownToolError } from './handlers.js';

export interface JsonRpcErrorBody {
  code: number;
  message: string;
  data: {
    code: string;
    message: string;
    [key: string]: unknown;
  };
}

export interface MappedToolError {
  status: number;
  error: JsonRpcErrorBody;
}

export const JSON_RPC_INVALID_PARAMS = -32602;
export const JSON_RPC_METHOD_NOT_FOUND = -32601;
export const JSON_RPC_INTERNAL_ERROR = -32603;

function describeZodIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`).join('; ');
}

/** Maps a tool failure onto an HTTP status and a JSON-RPC error body. */
export function mapToolError(error: unknown): MappedToolError {
  if (error instanceof ZodError) {
    const message = describeZodIssues(error);
    return {
      status: 400,
      error: { code: JSON_RPC_INVALID_PARAMS, message: 'Invalid params', data: { code: 'INVALID_INPUT', message } },
    };
  }
  if (error instanceof InvalidInputError) {
    return {
      status: 400,
      error: {
        code: JSON_RPC_INVALID_PARAMS,
        message: 'Invalid params',
        data: { code: error.code, message: error.message },
      },
    };
  }
  if (error instanceof UnknownToolError) {
    return {
      status: 404,
      error: {
        code: JSON_RPC_METHOD_NOT_FOUND,
        message: 'Method not found',
        data: { code: error.code, message: error.message },
      },
    };
  }
  if (error instanceof CreditExhaustedError) {
    return {
      status: 402,
      error: {
        code: 402,
        message: 'CREDITS_EXHAUSTED',
        data: { code: error.code, message: error.message, topUpUrl: error.topUpUrl },
      },
    };
  }
  if (error instanceof RateLimitError) {
    return {
      status: 429,
      error: {
        code: 429,
        message: 'RATE_LIMITED',
        data: { code: error.code, message: error.message, retryAfterSeconds: error.retryAfterSeconds },
      },
    };
  }
  if (error instanceof ConfigurationError) {
    return {
      status: 500,
      error: {
        code: JSON_RPC_INTERNAL_ERROR,
        message: 'CONFIGURATION_ERROR',
        data: { code: error.code, message: error.message },
      },
    };
  }
  return {
    status: 500,
    error: {
      code: JSON_RPC_INTERNAL_ERROR,
      message: 'Internal error',
      data: { code: 'INTERNAL_ERROR', message: error instanceof Error ? error.message : 'Unknown error' },
    },
  };
}
