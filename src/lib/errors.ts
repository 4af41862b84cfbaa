export class AppError extends Error {
  public readonly status: number;
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, options: { status?: number; code?: string; details?: unknown } = {}) {
    super(message);
    this.name = 'AppError';
    this.status = options.status ?? 500;
    this.code = options.code ?? 'internal_error';
    this.details = options.details;
  }
}

export const RpcErrorCode = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
  InvalidResult: -32000,
} as const;

export type RpcErrorCode = (typeof RpcErrorCode)[keyof typeof RpcErrorCode];

export interface RpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export class JsonRpcError extends AppError {
  public readonly rpcCode: number;
  public readonly rpcData?: unknown;

  constructor(message: string, options: { rpcCode?: number; rpcData?: unknown; status?: number; details?: unknown } = {}) {
    super(message, {
      status: options.status ?? 500,
      code: 'jsonrpc_error',
      details: options.details,
    });
    this.name = 'JsonRpcError';
    this.rpcCode = options.rpcCode ?? RpcErrorCode.InternalError;
    this.rpcData = options.rpcData;
  }

  static fromObject(error: RpcErrorObject): JsonRpcError {
    return new JsonRpcError(error.message, { rpcCode: error.code, rpcData: error.data });
  }

  public toObject(): RpcErrorObject {
    return this.rpcData === undefined
      ? { code: this.rpcCode, message: this.message }
      : { code: this.rpcCode, message: this.message, data: this.rpcData };
  }
}

/**
 * The IDL itself is unusable: undecodable elements, or a field whose type
 * resolves to neither a primitive, a struct nor an enum.
 */
export class SchemaError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, { status: 500, code: 'schema_error', details });
    this.name = 'SchemaError';
  }
}

/** A handler binding disagrees with the IDL, or registration happened after serving began. */
export class RegistrationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, { status: 500, code: 'registration_error', details });
    this.name = 'RegistrationError';
  }
}

export class ConversionError extends AppError {
  public readonly path: string;

  constructor(path: string, reason: string) {
    super(path ? `${path}: ${reason}` : reason, { status: 400, code: 'conversion_error' });
    this.name = 'ConversionError';
    this.path = path;
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function isJsonRpcError(error: unknown): error is JsonRpcError {
  return error instanceof JsonRpcError;
}

export function isConversionError(error: unknown): error is ConversionError {
  return error instanceof ConversionError;
}
