import path from 'node:path';
import { z } from 'zod';

const RawConfigSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  BUILD_VERSION: z.string().default('dev'),
  LOG_LEVEL: z.string().default('info'),
  IDL_PATH: z.string().optional(),
  RPC_PATH: z
    .string()
    .default('/rpc')
    .refine((value) => value.startsWith('/'), { message: 'RPC_PATH must start with "/"' }),
  BODY_LIMIT: z.string().default('1mb'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  ASCII_RESPONSES: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
});

export type AppConfig = ReturnType<typeof buildConfig>;

export function buildConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = RawConfigSchema.parse(env);

  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    buildVersion: parsed.BUILD_VERSION,
    serviceName: 'contract-rpc',
    logging: {
      level: parsed.LOG_LEVEL,
    },
    idl: {
      // Bundled sample contract, resolved from the repository root.
      path: parsed.IDL_PATH ?? path.resolve(__dirname, '..', '..', 'idl', 'sample.json'),
    },
    http: {
      rpcPath: parsed.RPC_PATH,
      bodyLimit: parsed.BODY_LIMIT,
      requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    },
    serializer: {
      forceAscii: parsed.ASCII_RESPONSES,
    },
  } as const;
}

export const config = buildConfig();
