import http from 'node:http';
import { config } from './config';
import { logger } from './logging/logger';
import { createApp } from './http/create-app';
import { loadServer } from './server';
import { registerSampleHandlers } from './sample/handlers';

async function bootstrap() {
  const rpcServer = await loadServer(config.idl.path, {
    forceAscii: config.serializer.forceAscii,
    register: registerSampleHandlers,
  });

  const app = createApp(rpcServer);
  const server = http.createServer(app);
  server.requestTimeout = config.http.requestTimeoutMs;

  await new Promise<void>((resolve) => {
    server.listen(config.port, () => {
      logger.info(
        { port: config.port, rpcPath: config.http.rpcPath, version: config.buildVersion },
        'JSON-RPC server listening',
      );
      resolve();
    });
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Received shutdown signal');
    server.close((error) => {
      if (error) {
        logger.error({ err: error }, 'Error during HTTP server shutdown');
      } else {
        logger.info('HTTP server closed gracefully');
      }
      process.exit(error ? 1 : 0);
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

bootstrap().catch((error) => {
  logger.fatal({ err: error }, 'Failed to bootstrap JSON-RPC server');
  process.exit(1);
});
