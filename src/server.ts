import { readFile } from 'node:fs/promises';
import { ContractModel } from './contract/model';
import { RpcDispatcher } from './rpc/dispatcher';
import { HandlerRegistry } from './rpc/registry';
import { JsonSerializer } from './rpc/serializer';
import { logger } from './logging/logger';

export interface RpcServer {
  model: ContractModel;
  registry: HandlerRegistry;
  dispatcher: RpcDispatcher;
}

export interface LoadServerOptions {
  forceAscii?: boolean;
  /** Bind handlers here; the registry is sealed as soon as this returns. */
  register: (registry: HandlerRegistry) => void;
}

/**
 * Reads and validates the IDL, runs handler registration and seals the
 * registry. Any SchemaError or RegistrationError propagates to the caller.
 */
export async function loadServer(idlPath: string, options: LoadServerOptions): Promise<RpcServer> {
  const model = ContractModel.parse(await readFile(idlPath));
  model.validate();
  logger.info(
    { idlPath, interfaces: model.interfaceNames(), checksum: model.meta?.checksum },
    'Loaded IDL contract',
  );

  const registry = new HandlerRegistry(model);
  options.register(registry);
  registry.seal();

  const missing = model.interfaceNames().filter((name) => !registry.has(name));
  if (missing.length > 0) {
    logger.warn({ missing }, 'IDL interfaces without a registered handler');
  }

  const dispatcher = new RpcDispatcher(model, registry, {
    serializer: new JsonSerializer({ forceAscii: options.forceAscii }),
  });
  return { model, registry, dispatcher };
}
