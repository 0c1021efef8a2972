/**
 * JSON-RPC 2.0 envelope schemas, error type and response builders.
 */

import { ErrorCode as McpErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

/**
 * Standard JSON-RPC error codes used by the gateway.
 */
export const JsonRpcErrorCode = {
  PARSE_ERROR: McpErrorCode.ParseError,
  INVALID_REQUEST: McpErrorCode.InvalidRequest,
  METHOD_NOT_FOUND: McpErrorCode.MethodNotFound,
  INVALID_PARAMS: McpErrorCode.InvalidParams,
  INTERNAL_ERROR: McpErrorCode.InternalError,
} as const;

export type JsonRpcErrorCodeValue = (typeof JsonRpcErrorCode)[keyof typeof JsonRpcErrorCode];

export const JsonRpcIdSchema = z.union([z.string(), z.number(), z.null()]);

export type JsonRpcId = z.infer<typeof JsonRpcIdSchema>;

export const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  method: z.string().min(1),
  params: z.record(z.string(), z.unknown()).nullable().optional(),
  id: JsonRpcIdSchema.optional(),
});

export type JsonRpcRequest = z.infer<typeof JsonRpcRequestSchema>;

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export type JsonRpcResponse =
  | { jsonrpc: '2.0'; id: JsonRpcId; result: unknown }
  | { jsonrpc: '2.0'; id: JsonRpcId; error: JsonRpcErrorObject };

/**
 * Protocol-level failure carried back to the caller as an error envelope.
 */
export class JsonRpcError extends Error {
  constructor(
    public readonly code: JsonRpcErrorCodeValue,
    message: string,
    public readonly data?: unknown
  ) {
    super(message);
    this.name = 'JsonRpcError';
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toErrorObject(): JsonRpcErrorObject {
    return createError(this.code, this.message, this.data);
  }
}

export function createError(code: number, message: string, data?: unknown): JsonRpcErrorObject {
  return data === undefined ? { code, message } : { code, message, data };
}

export function successResponse(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return { jsonrpc: '2.0', id, result };
}

export function errorResponse(id: JsonRpcId, error: JsonRpcErrorObject): JsonRpcResponse {
  return { jsonrpc: '2.0', id, error };
}

/**
 * Best-effort id recovery from a body that failed envelope validation.
 */
export function extractRequestId(body: unknown): JsonRpcId {
  if (typeof body === 'object' && body !== null && 'id' in body) {
    const parsed = JsonRpcIdSchema.safeParse(body.id);
    if (parsed.success) {
      return parsed.data;
    }
  }
  return null;
}

/**
 * A request without an id (or with a null id) is a notification.
 */
export function isNotification(request: JsonRpcRequest): boolean {
  return request.id === undefined || request.id === null;
}
