import { readFile } from 'node:fs/promises';
import { createLogger, type Logger, type LogLevel } from '@tessellate/core';
import { openRevisionDatabase, type TessellateDatabase } from '@tessellate/db';
import {
  EXIT_NOT_FOUND,
  EXIT_RUNTIME_ERROR,
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
} from './constants.js';

export type ExitCode =
  | typeof EXIT_SUCCESS
  | typeof EXIT_USAGE_ERROR
  | typeof EXIT_NOT_FOUND
  | typeof EXIT_RUNTIME_ERROR;

export type CliIo = {
  stdout: (message: string) => void;
  stderr: (message: string) => void;
  cwd: string;
  env: NodeJS.ProcessEnv;
};

export type CliDependencies = {
  /** Opens the revision database at `path` with its schema migrated. */
  openDatabase: (path: string) => TessellateDatabase;
  closeDatabase: (db: TessellateDatabase) => void;
  readTextFile: (path: string) => Promise<string>;
  createLogger: (component: string, level: LogLevel) => Logger;
  now: () => string;
};

export type MainOptions = {
  dependencies?: CliDependencies;
  io?: CliIo;
};

export type CliEntrypointRuntime = {
  argv: string[];
  exit: (code: number) => void;
};

export type CliConfig = {
  databasePath: string;
  logLevel: LogLevel;
  maxNestingDepth: number;
};

export type ParsedOptions =
  | {
      ok: true;
      options: Map<string, string>;
      positionals: string[];
    }
  | {
      ok: false;
      message: string;
    };

export type ParsedLongOptionToken =
  | {
      kind: 'positional';
      value: string;
    }
  | {
      kind: 'separator';
    }
  | {
      kind: 'option-inline';
      optionName: string;
      optionValue: string;
    }
  | {
      kind: 'option-next';
      optionName: string;
    }
  | {
      kind: 'flag';
      optionName: string;
    }
  | {
      kind: 'error';
      message: string;
    };

export type ValidatedCommandOptions =
  | {
      ok: true;
      options: Map<string, string>;
      positionals: string[];
    }
  | {
      ok: false;
      exitCode: ExitCode;
    };

export type CommandValidationConfig = {
  commandName: string;
  usage: string;
  allowedOptions: readonly string[];
  flagOptions?: readonly string[];
  positionalCount?: number;
};

export const defaultDependencies: CliDependencies = {
  openDatabase: path => openRevisionDatabase(path),
  closeDatabase: db => db.$client.close(),
  readTextFile: path => readFile(path, 'utf8'),
  createLogger: (component, level) => createLogger(component, { level }),
  now: () => new Date().toISOString(),
};
