export { ContractModel, PRIMITIVE_TYPES, isPrimitiveType } from './contract/model';
export type {
  ContractMeta,
  EnumDefinition,
  FieldDescriptor,
  PrimitiveType,
  RpcFunction,
  RpcInterface,
  StructDefinition,
} from './contract/model';
export type { SchemaElement, SchemaElementInput } from './contract/elements';
export { ValueConverter } from './contract/converter';
export { sampleValue } from './contract/samples';
export { t, representationOf, describeRepresentation } from './contract/representation';
export type { Infer, Representation, Typed } from './contract/representation';
export {
  AppError,
  ConversionError,
  JsonRpcError,
  RegistrationError,
  RpcErrorCode,
  SchemaError,
} from './lib/errors';
export type { RpcErrorObject } from './lib/errors';
export { HandlerRegistry } from './rpc/registry';
export { RpcDispatcher, parseMethod } from './rpc/dispatcher';
export { RpcClient, InterfaceProxy } from './rpc/client';
export type { BatchRequest, BatchResponse, IdGenerator, RpcClientOptions } from './rpc/client';
export { HttpTransport, InProcessTransport } from './rpc/transport';
export type { Transport } from './rpc/transport';
export { JsonSerializer } from './rpc/serializer';
export type { Serializer } from './rpc/serializer';
export { IDL_METHOD, method } from './rpc/types';
export type { HandlerBinding, JsonRpcRequest, JsonRpcResponse, MethodBinding } from './rpc/types';
export { createApp } from './http/create-app';
export { loadServer } from './server';
export type { RpcServer } from './server';
