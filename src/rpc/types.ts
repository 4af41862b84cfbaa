import { z } from 'zod';
import type { RpcErrorObject } from '../lib/errors';
import type { Infer, Representation, Typed } from '../contract/representation';

/** Reserved method returning the raw IDL elements. */
export const IDL_METHOD = 'barrister-idl';

export const JsonRpcIdSchema = z.union([z.string(), z.number(), z.null()]);

export const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0').optional(),
  id: JsonRpcIdSchema.optional(),
  method: z.string(),
  params: z.unknown().optional(),
});

export const RpcErrorObjectSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const JsonRpcResponseSchema = z.object({
  jsonrpc: z.string().optional(),
  id: JsonRpcIdSchema.optional(),
  result: z.unknown().optional(),
  error: RpcErrorObjectSchema.optional(),
});

export type JsonRpcId = z.infer<typeof JsonRpcIdSchema>;

export type JsonRpcRequest = z.infer<typeof JsonRpcRequestSchema>;

export type JsonRpcSuccess = {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: unknown;
};

export type JsonRpcFailure = {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: RpcErrorObject;
};

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

export type InferParams<P extends readonly Representation[]> = {
  -readonly [K in keyof P]: Infer<P[K]>;
};

/**
 * One callable bound to an IDL function. `params` and `returns` are the
 * representations the callable expects and produces; both are checked
 * against the IDL when the handler is registered.
 */
export interface MethodBinding {
  readonly params: readonly Representation[];
  readonly returns: Representation;
  readonly callable: (...args: never) => unknown;
}

/** Callable name (capitalized IDL function name) to binding. */
export type HandlerBinding = Readonly<Record<string, MethodBinding>>;

export function method<const P extends readonly Typed<unknown>[], R extends Typed<unknown>>(
  params: P,
  returns: R,
  callable: (...args: InferParams<P>) => Infer<R> | Promise<Infer<R>>,
): MethodBinding {
  return { params, returns, callable };
}
