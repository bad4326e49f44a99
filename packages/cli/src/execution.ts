import { resolve } from 'node:path';
import {
  DEFAULT_MAX_NESTING_DEPTH,
  RevisionNotFoundError,
  createRevisionService,
  isCoreError,
  logLevels,
  type Logger,
  type RevisionService,
} from '@tessellate/core';
import { createSqlRevisionStore } from '@tessellate/db';
import { z } from 'zod';
import {
  DEFAULT_DATABASE_FILE,
  EXIT_NOT_FOUND,
  EXIT_RUNTIME_ERROR,
  EXIT_USAGE_ERROR,
} from './constants.js';
import { toErrorMessage } from './io.js';
import type { CliConfig, CliDependencies, CliIo, ExitCode } from './types.js';

function optionalSetting(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

const cliEnvironmentSchema = z.object({
  TESSELLATE_DB_PATH: z.preprocess(optionalSetting, z.string().optional()),
  TESSELLATE_LOG_LEVEL: z.preprocess(
    value => optionalSetting(value)?.toLowerCase(),
    z.enum(logLevels).default('info'),
  ),
  TESSELLATE_MAX_NESTING_DEPTH: z.preprocess(
    optionalSetting,
    z.coerce.number().int().positive().default(DEFAULT_MAX_NESTING_DEPTH),
  ),
});

export class CliConfigError extends Error {
  readonly code = 'CLI_CONFIG_INVALID';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'CliConfigError';
  }
}

export function resolveCliConfig(io: Pick<CliIo, 'cwd' | 'env'>): CliConfig {
  const parsed = cliEnvironmentSchema.safeParse(io.env);
  if (!parsed.success) {
    throw new CliConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }

  const environment = parsed.data;
  return {
    databasePath: resolve(io.cwd, environment.TESSELLATE_DB_PATH ?? DEFAULT_DATABASE_FILE),
    logLevel: environment.TESSELLATE_LOG_LEVEL,
    maxNestingDepth: environment.TESSELLATE_MAX_NESTING_DEPTH,
  };
}

export type CliContext = {
  config: CliConfig;
  logger: Logger;
  service: RevisionService;
  /** Releases the database handle opened for the command. */
  close: () => void;
};

export function openCliContext(dependencies: CliDependencies, io: CliIo): CliContext {
  const config = resolveCliConfig(io);
  const logger = dependencies.createLogger('tessellate-cli', config.logLevel);
  const db = dependencies.openDatabase(config.databasePath);
  logger.debug({ databasePath: config.databasePath }, 'Opened revision database');

  const service = createRevisionService(createSqlRevisionStore(db), {
    logger: logger.child({ component: 'revision-service' }),
    now: dependencies.now,
    maxNestingDepth: config.maxNestingDepth,
  });
  return { config, logger, service, close: () => dependencies.closeDatabase(db) };
}

/** Maps a failure to its exit code and reports it on stderr. */
export function reportCommandError(io: Pick<CliIo, 'stderr'>, action: string, error: unknown): ExitCode {
  if (error instanceof CliConfigError) {
    io.stderr(error.message);
    return EXIT_USAGE_ERROR;
  }

  if (error instanceof RevisionNotFoundError) {
    io.stderr(error.message);
    return EXIT_NOT_FOUND;
  }

  if (isCoreError(error)) {
    io.stderr(`Failed to ${action}: ${error.message}`);
    if (error.retryable) {
      io.stderr('The operation can be retried.');
    }
    return EXIT_RUNTIME_ERROR;
  }

  io.stderr(`Failed to ${action}: ${toErrorMessage(error)}`);
  return EXIT_RUNTIME_ERROR;
}

/**
 * Opens the revision service and runs one command against it, turning any
 * thrown error into an exit code.
 */
export async function runWithService(
  dependencies: CliDependencies,
  io: CliIo,
  action: string,
  command: (context: CliContext) => ExitCode | Promise<ExitCode>,
): Promise<ExitCode> {
  let context: CliContext | null = null;
  try {
    context = openCliContext(dependencies, io);
    return await command(context);
  } catch (error) {
    return reportCommandError(io, action, error);
  } finally {
    context?.close();
  }
}
