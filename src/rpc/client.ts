import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { ValueConverter } from '../contract/converter';
import { ContractModel } from '../contract/model';
import { representationOf } from '../contract/representation';
import { isConversionError, JsonRpcError, RpcErrorCode } from '../lib/errors';
import { componentLogger } from '../logging/logger';
import { JsonSerializer, type Serializer } from './serializer';
import type { Transport } from './transport';
import {
  IDL_METHOD,
  JsonRpcResponseSchema,
  type JsonRpcId,
  type JsonRpcRequest,
} from './types';

const log = componentLogger('rpc-client');

export type IdGenerator = () => string;

export interface RpcClientOptions {
  serializer?: Serializer;
  /** Source of request ids; inject a deterministic one in tests. */
  idGenerator?: IdGenerator;
}

export type BatchRequest = Pick<JsonRpcRequest, 'method' | 'params'> & { id?: JsonRpcId };

export type BatchResponse = z.infer<typeof JsonRpcResponseSchema>;

// A server that cannot decode the batch answers with one envelope instead of an array.
const BatchResponseSchema = z.union([
  z.array(JsonRpcResponseSchema),
  JsonRpcResponseSchema.transform((response) => [response]),
]);

export class RpcClient {
  private readonly serializer: Serializer;
  private readonly nextId: IdGenerator;

  constructor(
    private readonly transport: Transport,
    options: RpcClientOptions = {},
  ) {
    this.serializer = options.serializer ?? new JsonSerializer();
    this.nextId = options.idGenerator ?? randomUUID;
  }

  /** Calls one method with positional params. Rejects with JsonRpcError on any failure. */
  public async call(method: string, ...params: unknown[]): Promise<unknown> {
    const request = { jsonrpc: '2.0', id: this.nextId(), method, params };

    const payload = this.encodeRequest(request, method);
    const raw = await this.exchange(payload, method);

    let decoded: unknown;
    try {
      decoded = this.serializer.decode(raw);
    } catch (error) {
      throw new JsonRpcError(`${method}: unable to decode response: ${(error as Error).message}`, {
        rpcCode: RpcErrorCode.InternalError,
      });
    }

    const response = JsonRpcResponseSchema.safeParse(decoded);
    if (!response.success) {
      throw new JsonRpcError(`${method}: response is not a JSON-RPC response`, {
        rpcCode: RpcErrorCode.InternalError,
        rpcData: response.error.issues,
      });
    }

    if (response.data.error) {
      throw JsonRpcError.fromObject(response.data.error);
    }
    return response.data.result ?? null;
  }

  /**
   * Sends several requests in one round trip. Responses come back in request
   * order. Encoding or transport failures produce a single error response.
   */
  public async callBatch(requests: readonly BatchRequest[]): Promise<BatchResponse[]> {
    const batch = requests.map((request) => ({
      jsonrpc: '2.0',
      id: request.id ?? this.nextId(),
      method: request.method,
      params: request.params,
    }));

    try {
      const payload = this.encodeRequest(batch, 'batch');
      const raw = await this.exchange(payload, 'batch');

      let decoded: unknown;
      try {
        decoded = this.serializer.decode(raw);
      } catch (error) {
        throw new JsonRpcError(`batch: unable to decode response: ${(error as Error).message}`, {
          rpcCode: RpcErrorCode.InternalError,
        });
      }

      const responses = BatchResponseSchema.safeParse(decoded);
      if (!responses.success) {
        throw new JsonRpcError('batch: response is not an array of JSON-RPC responses', {
          rpcCode: RpcErrorCode.InternalError,
        });
      }
      return responses.data;
    } catch (error) {
      if (error instanceof JsonRpcError) {
        return [{ jsonrpc: '2.0', id: null, error: error.toObject() }];
      }
      throw error;
    }
  }

  /** Retrieves the server's IDL through the reserved introspection method. */
  public async fetchContract(): Promise<ContractModel> {
    const elements = await this.call(IDL_METHOD);
    return ContractModel.build(elements);
  }

  public proxy(model: ContractModel, interfaceName: string): InterfaceProxy {
    return new InterfaceProxy(this, model, interfaceName);
  }

  private encodeRequest(request: unknown, method: string): string {
    try {
      return this.serializer.encode(request);
    } catch (error) {
      throw new JsonRpcError(`${method}: unable to encode request: ${(error as Error).message}`, {
        rpcCode: RpcErrorCode.InvalidRequest,
      });
    }
  }

  private async exchange(payload: string, method: string): Promise<string> {
    try {
      return await this.transport.send(payload);
    } catch (error) {
      log.warn({ err: error, method }, 'Transport failed during JSON-RPC call');
      throw new JsonRpcError(`${method}: transport error during request: ${(error as Error).message}`, {
        rpcCode: RpcErrorCode.InternalError,
      });
    }
  }
}

/**
 * Client-side view of one IDL interface. Results are checked against the
 * function's declared return type before they reach the caller.
 */
export class InterfaceProxy {
  private readonly converter: ValueConverter;

  constructor(
    private readonly client: RpcClient,
    private readonly model: ContractModel,
    private readonly interfaceName: string,
  ) {
    this.converter = new ValueConverter(model);
  }

  public async call(functionName: string, ...params: unknown[]): Promise<unknown> {
    const method = `${this.interfaceName}.${functionName}`;
    const fn = this.model.lookupMethod(method);
    if (!fn) {
      throw new JsonRpcError(`Unsupported method: ${method}`, { rpcCode: RpcErrorCode.MethodNotFound });
    }

    const result = await this.client.call(method, ...params);
    try {
      return this.converter.convert(fn.returns, representationOf(this.model, fn.returns), result, 'result');
    } catch (error) {
      if (isConversionError(error)) {
        throw new JsonRpcError(`${method} returned invalid type: ${error.message}`, {
          rpcCode: RpcErrorCode.InvalidResult,
        });
      }
      throw error;
    }
  }
}
