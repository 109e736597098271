export {
  createLogger,
  redactSecrets,
  type Logger,
  type CreateLoggerOptions,
} from './logger.js';

export {
  AppError,
  ValidationError,
  SchemaUnavailableError,
  DatabaseConnectionError,
  DatabaseOperationError,
  DatabaseConfigError,
  toError,
} from './errors.js';

export {
  NONE_MARKER,
  isBlank,
  isPlaceholder,
  safeParseInt,
  safeParseFloat,
  toText,
  clamp,
  compareOrdinal,
} from './utils.js';

export {
  AppEnvSchema,
  ProductionEnvSchema,
  validateEnv,
  getEnv,
  type AppEnv,
} from './env.js';

export {
  createIsolatedDatabaseClient,
  withConnection,
  type DatabaseClient,
  type DatabasePool,
  type PoolClient,
  type QueryResult,
  type DatabaseConfig,
} from './database.js';
