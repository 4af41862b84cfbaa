import express from 'express';
import cors from 'cors';
import type { Application } from 'express';
import { config } from '../config';
import type { ContractModel } from '../contract/model';
import { correlationIdMiddleware } from '../middleware/correlation-id';
import { requestLogger } from '../middleware/request-logger';
import { errorHandler } from '../middleware/error-handler';
import type { RpcDispatcher } from '../rpc/dispatcher';
import type { HandlerRegistry } from '../rpc/registry';

export interface AppDependencies {
  model: ContractModel;
  registry: HandlerRegistry;
  dispatcher: RpcDispatcher;
  rpcPath?: string;
  bodyLimit?: string;
}

function buildServerMetadata(deps: AppDependencies, rpcPath: string) {
  return {
    name: config.serviceName,
    version: config.buildVersion,
    contract: deps.model.meta
      ? {
          checksum: deps.model.meta.checksum,
          generatedAt: deps.model.meta.generatedAt.toISOString(),
          barristerVersion: deps.model.meta.barristerVersion,
        }
      : null,
    interfaces: deps.model.interfaceNames(),
    endpoints: {
      rpc: rpcPath,
      idl: '/idl',
      health: '/healthz',
    },
  };
}

export function createApp(deps: AppDependencies): Application {
  const rpcPath = deps.rpcPath ?? config.http.rpcPath;
  const app = express();
  app.disable('x-powered-by');

  app.use(cors());
  app.use(correlationIdMiddleware);
  app.use((req, res, next) => requestLogger(req, res, next));

  app.get('/', (_req, res) => {
    res.json(buildServerMetadata(deps, rpcPath));
  });

  app.get('/healthz', (_req, res) => {
    const registered = deps.registry.interfaceNames();
    const missing = deps.model.interfaceNames().filter((name) => !deps.registry.has(name));
    res.json({
      status: 'ok',
      service: config.serviceName,
      version: config.buildVersion,
      timestamp: new Date().toISOString(),
      uptimeSeconds: Math.round(process.uptime()),
      handlers: {
        registered,
        missing,
        sealed: deps.registry.isSealed(),
      },
    });
  });

  app.get('/idl', (_req, res) => {
    res.json(deps.model.rawElements());
  });

  // The dispatcher decides between single and batch requests, so it needs the raw text.
  app.post(rpcPath, express.text({ type: () => true, limit: deps.bodyLimit ?? config.http.bodyLimit }), async (req, res, next) => {
    try {
      const body: unknown = req.body;
      const response = await deps.dispatcher.invoke(typeof body === 'string' ? body : '');
      res.type('application/json').send(response);
    } catch (error) {
      next(error);
    }
  });

  app.all(rpcPath, (_req, res) => {
    res.status(405).json({
      status: 405,
      code: 'method_not_allowed',
      message: `Only POST is allowed for ${rpcPath}.`,
    });
  });

  app.use((_req, res) => {
    res.status(404).json({
      status: 404,
      code: 'not_found',
      message: 'Endpoint not found.',
    });
  });

  app.use(errorHandler);

  return app;
}
