import { type CreateLoggerOptions, LogLevel } from '@cqltrace/logger';
import { createLogger } from '@cqltrace/logger/pino';
import { z } from 'zod/v4';
import {
  type ClusterOptions,
  DEFAULT_LOCAL_DATA_CENTER,
  DEFAULT_PAGE_SIZE,
  DEFAULT_PORT,
} from './cluster';
import { ClusterConfigError } from './errors';

const hostList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((host) => host.trim())
      .filter((host) => host.length > 0),
  )
  .pipe(z.array(z.string()).min(1, 'must list at least one host'));

export const clusterEnvSchema = z
  .object({
    CASSANDRA_HOSTS: hostList,
    CASSANDRA_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
    CASSANDRA_KEYSPACE: z.string().optional(),
    CASSANDRA_LOCAL_DC: z.string().min(1).default(DEFAULT_LOCAL_DATA_CENTER),
    CASSANDRA_PROTO_VERSION: z.coerce.number().int().min(1).max(6).optional(),
    CASSANDRA_USERNAME: z.string().optional(),
    CASSANDRA_PASSWORD: z.string().optional(),
    CASSANDRA_PAGE_SIZE: z.coerce.number().int().positive().default(DEFAULT_PAGE_SIZE),
    CASSANDRA_LOG_LEVEL: z.enum(LogLevel).default(LogLevel.Info),
    CASSANDRA_LOG_PRETTY: z.stringbool().default(false),
  })
  .refine(
    (env) =>
      (env.CASSANDRA_USERNAME === undefined) ===
      (env.CASSANDRA_PASSWORD === undefined),
    {
      message: 'CASSANDRA_USERNAME and CASSANDRA_PASSWORD must be set together',
      path: ['CASSANDRA_PASSWORD'],
    },
  );

export type ClusterEnv = z.infer<typeof clusterEnvSchema>;

/**
 * Reads cluster options from environment variables. The returned options
 * carry a pino logger that redacts credentials, writing to `destination`
 * when given.
 *
 * @throws {ClusterConfigError} listing every invalid variable
 *
 * @example
 * ```typescript
 * // CASSANDRA_HOSTS=10.0.0.1,10.0.0.2 CASSANDRA_KEYSPACE=shop
 * const cluster = new Cluster({ ...loadClusterOptions(), logger });
 * ```
 */
export function loadClusterOptions(
  env: Record<string, string | undefined> = process.env,
  destination?: CreateLoggerOptions['destination'],
): ClusterOptions {
  const result = clusterEnvSchema.safeParse(env);

  if (!result.success) {
    throw new ClusterConfigError(
      'Invalid Cassandra environment configuration',
      result.error.issues.map((issue) => ({
        path: issue.path.map(String).join('.'),
        message: issue.message,
      })),
    );
  }

  const parsed = result.data;
  const logger = createLogger({
    level: parsed.CASSANDRA_LOG_LEVEL,
    pretty: parsed.CASSANDRA_LOG_PRETTY,
    destination,
  });
  const options: ClusterOptions = {
    hosts: parsed.CASSANDRA_HOSTS,
    port: parsed.CASSANDRA_PORT,
    keyspace: parsed.CASSANDRA_KEYSPACE,
    localDataCenter: parsed.CASSANDRA_LOCAL_DC,
    protoVersion: parsed.CASSANDRA_PROTO_VERSION,
    pageSize: parsed.CASSANDRA_PAGE_SIZE,
    logger,
  };

  if (
    parsed.CASSANDRA_USERNAME !== undefined &&
    parsed.CASSANDRA_PASSWORD !== undefined
  ) {
    options.credentials = {
      username: parsed.CASSANDRA_USERNAME,
      password: parsed.CASSANDRA_PASSWORD,
    };
  }

  logger.debug(
    {
      options: {
        hosts: options.hosts,
        port: options.port,
        keyspace: options.keyspace,
        localDataCenter: options.localDataCenter,
        credentials: options.credentials,
      },
    },
    'Loaded Cassandra configuration',
  );

  return options;
}
