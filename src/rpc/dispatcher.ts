import { z } from 'zod';
import { ValueConverter } from '../contract/converter';
import type { ContractModel } from '../contract/model';
import { decodeText, firstSignificantChar } from '../lib/encoding';
import { isConversionError, isJsonRpcError, JsonRpcError, RpcErrorCode, SchemaError } from '../lib/errors';
import { componentLogger } from '../logging/logger';
import { getCorrelationId } from '../middleware/correlation-id';
import { capitalize, HandlerRegistry } from './registry';
import { JsonSerializer, type Serializer } from './serializer';
import {
  IDL_METHOD,
  JsonRpcRequestSchema,
  RpcErrorObjectSchema,
  type JsonRpcId,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from './types';

const log = componentLogger('rpc-dispatcher');

export interface DispatcherOptions {
  serializer?: Serializer;
}

export interface ParsedMethod {
  interfaceName: string;
  functionName: string;
}

/**
 * Splits "Interface.function" at the first dot and capitalizes the function
 * part. Without a dot, or with a trailing one, the whole string is the
 * interface name and the function name is empty.
 */
export function parseMethod(method: string): ParsedMethod {
  const index = method.indexOf('.');
  if (index > -1 && index < method.length - 1) {
    return {
      interfaceName: method.slice(0, index),
      functionName: capitalize(method.slice(index + 1)),
    };
  }
  return { interfaceName: method, functionName: '' };
}

function failure(id: JsonRpcId, code: number, message: string, data?: unknown): JsonRpcResponse {
  return {
    jsonrpc: '2.0',
    id,
    error: data === undefined ? { code, message } : { code, message, data },
  };
}

const JsonRpcBatchSchema = z.array(JsonRpcRequestSchema);

export class RpcDispatcher {
  private readonly converter: ValueConverter;
  private readonly serializer: Serializer;

  constructor(
    private readonly model: ContractModel,
    private readonly registry: HandlerRegistry,
    options: DispatcherOptions = {},
  ) {
    this.converter = new ValueConverter(model);
    this.serializer = options.serializer ?? new JsonSerializer();
  }

  /**
   * Entry point for wire payloads. Returns the encoded response: an object for
   * a single request, an array (same order as the requests) for a batch.
   */
  public async invoke(input: string | Uint8Array): Promise<string> {
    const text = decodeText(input);
    const first = firstSignificantChar(text);
    if (first !== '{' && first !== '[') {
      return this.serializer.encode(
        failure(null, RpcErrorCode.ParseError, 'Unable to parse JSON: request must be an object or an array'),
      );
    }

    let payload: unknown;
    try {
      payload = this.serializer.decode(text);
    } catch (error) {
      log.warn({ err: error, correlationId: getCorrelationId() }, 'Undecodable JSON-RPC payload');
      return this.serializer.encode(
        failure(null, RpcErrorCode.ParseError, `Unable to parse JSON: ${(error as Error).message}`),
      );
    }

    return this.serializer.encode(await this.handle(payload));
  }

  /**
   * Dispatches an already decoded payload. A payload that is not a request
   * record, or a batch holding anything else, gets a single parse error.
   */
  public async handle(payload: unknown): Promise<JsonRpcResponse | JsonRpcResponse[]> {
    if (!Array.isArray(payload)) {
      const request = JsonRpcRequestSchema.safeParse(payload);
      if (!request.success) {
        return this.undecodableRequest(request.error);
      }
      return this.invokeOne(request.data);
    }

    const batch = JsonRpcBatchSchema.safeParse(payload);
    if (!batch.success) {
      return this.undecodableRequest(batch.error);
    }

    const responses: JsonRpcResponse[] = [];
    for (const request of batch.data) {
      responses.push(await this.invokeOne(request));
    }
    return responses;
  }

  public async invokeOne(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    const id = request.id ?? null;

    if (request.method === IDL_METHOD) {
      return { jsonrpc: '2.0', id, result: this.model.rawElements() };
    }

    const params =
      request.params === undefined ? [] : Array.isArray(request.params) ? request.params : [request.params];

    try {
      const result = await this.call(request.method, ...params);
      return { jsonrpc: '2.0', id, result };
    } catch (error) {
      return this.handleError(error, request);
    }
  }

  /**
   * Resolves and invokes one method. Resolves with the converted result;
   * rejects with JsonRpcError for every per-request failure, and with
   * SchemaError when the IDL references a type it does not define.
   */
  public async call(method: string, ...params: unknown[]): Promise<unknown> {
    const fn = this.model.lookupMethod(method);
    if (!fn) {
      throw new JsonRpcError(`Unsupported method: ${method}`, { rpcCode: RpcErrorCode.MethodNotFound });
    }

    const { interfaceName, functionName } = parseMethod(method);
    const handler = this.registry.get(interfaceName);
    if (!handler) {
      throw new JsonRpcError(`No handler registered for interface: ${interfaceName}`, {
        rpcCode: RpcErrorCode.MethodNotFound,
      });
    }

    const binding = handler.get(functionName);
    if (!binding) {
      throw new JsonRpcError(`Function ${functionName} not found on handler ${interfaceName}`, {
        rpcCode: RpcErrorCode.MethodNotFound,
      });
    }

    for (const expected of [binding.params.length, fn.params.length]) {
      if (params.length !== expected) {
        throw new JsonRpcError(`Method ${method} expects ${expected} params but was passed ${params.length}`, {
          rpcCode: RpcErrorCode.InvalidParams,
        });
      }
    }

    const args = params.map((value, index) => {
      try {
        return this.converter.convert(fn.params[index], binding.params[index], value, `param[${index}]`);
      } catch (error) {
        if (isConversionError(error)) {
          throw new JsonRpcError(error.message, { rpcCode: RpcErrorCode.InvalidParams });
        }
        throw error;
      }
    });

    let outcome: unknown;
    try {
      outcome = await Reflect.apply(binding.callable, undefined, args);
    } catch (error) {
      throw this.toRpcError(error, method);
    }

    try {
      return this.converter.convert(fn.returns, binding.returns, outcome, 'result');
    } catch (error) {
      if (isConversionError(error)) {
        log.error({ method, path: error.path, correlationId: getCorrelationId() }, 'Handler returned a value outside its contract');
        throw new JsonRpcError(`Method ${method} returned an invalid result: ${error.message}`, {
          rpcCode: RpcErrorCode.InternalError,
        });
      }
      throw error;
    }
  }

  private undecodableRequest(error: z.ZodError): JsonRpcResponse {
    log.warn({ issues: error.issues, correlationId: getCorrelationId() }, 'Payload is not a JSON-RPC request');
    return failure(
      null,
      RpcErrorCode.ParseError,
      'Unable to parse JSON: payload is not a JSON-RPC request',
      error.issues,
    );
  }

  /** Normalizes what a handler threw: well-formed RPC errors pass through, anything else is internal. */
  private toRpcError(error: unknown, method: string): JsonRpcError {
    if (isJsonRpcError(error)) {
      return error;
    }

    const shaped = RpcErrorObjectSchema.safeParse(error);
    if (shaped.success) {
      return JsonRpcError.fromObject(shaped.data);
    }

    log.error({ err: error, method, correlationId: getCorrelationId() }, 'Handler raised a non JSON-RPC error');
    return new JsonRpcError(`Method ${method} failed with an unexpected error`, {
      rpcCode: RpcErrorCode.InternalError,
    });
  }

  private handleError(error: unknown, request: JsonRpcRequest): JsonRpcResponse {
    const id = request.id ?? null;
    if (isJsonRpcError(error)) {
      return failure(id, error.rpcCode, error.message, error.rpcData);
    }

    if (error instanceof SchemaError) {
      log.fatal({ err: error, method: request.method }, 'IDL references an undefined type');
    } else {
      log.error({ err: error, method: request.method }, 'Unhandled error during JSON-RPC call');
    }
    return failure(id, RpcErrorCode.InternalError, 'Internal error');
  }
}
