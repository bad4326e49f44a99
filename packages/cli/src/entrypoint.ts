import { realpathSync } from 'node:fs';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
} from './constants.js';
import { handleCodeCommand } from './commands/code.js';
import { handleCompileCommand } from './commands/compile.js';
import { handleDeleteCommand } from './commands/delete.js';
import { handleImportCommand } from './commands/import.js';
import { handleDisableCommand, handleReleaseCommand } from './commands/lifecycle.js';
import { handleListCommand } from './commands/list.js';
import { handleNestingCommand } from './commands/nesting.js';
import { handleShowCommand } from './commands/show.js';
import { createDefaultIo, printGeneralUsage } from './io.js';
import type {
  CliEntrypointRuntime,
  ExitCode,
  MainOptions,
} from './types.js';
import { defaultDependencies } from './types.js';

export function normalizePathForComparison(path: string): string {
  const absolutePath = resolve(path);
  try {
    return realpathSync(absolutePath);
  } catch {
    return absolutePath;
  }
}

export function isExecutedAsScript(
  entrypoint: string | undefined = process.argv[1],
  moduleUrl: string = import.meta.url,
): boolean {
  if (!entrypoint) {
    return false;
  }

  const entrypointPath = normalizePathForComparison(entrypoint);
  const modulePath = normalizePathForComparison(fileURLToPath(moduleUrl));
  return modulePath === entrypointPath;
}

export function createDefaultEntrypointRuntime(): CliEntrypointRuntime {
  return {
    argv: process.argv,
    exit: code => process.exit(code),
  };
}

export async function runCliEntrypoint(
  runtime: CliEntrypointRuntime = createDefaultEntrypointRuntime(),
  options: MainOptions = {},
): Promise<void> {
  const exitCode = await main(runtime.argv.slice(2), options);
  if (exitCode !== EXIT_SUCCESS) {
    runtime.exit(exitCode);
  }
}

export async function main(args: string[] = process.argv.slice(2), options: MainOptions = {}): Promise<ExitCode> {
  const dependencies = options.dependencies ?? defaultDependencies;
  const io = options.io ?? createDefaultIo();
  const command = args[0];

  if (!command || command === 'help' || command === '--help' || command === '-h') {
    printGeneralUsage(io);
    return EXIT_SUCCESS;
  }

  const rawArgs = args.slice(1);
  switch (command) {
    case 'import':
      return handleImportCommand(rawArgs, dependencies, io);
    case 'list':
      return handleListCommand(rawArgs, dependencies, io);
    case 'show':
      return handleShowCommand(rawArgs, dependencies, io);
    case 'nesting':
      return handleNestingCommand(rawArgs, dependencies, io);
    case 'compile':
      return handleCompileCommand(rawArgs, dependencies, io);
    case 'release':
      return handleReleaseCommand(rawArgs, dependencies, io);
    case 'disable':
      return handleDisableCommand(rawArgs, dependencies, io);
    case 'delete':
      return handleDeleteCommand(rawArgs, dependencies, io);
    case 'code':
      return handleCodeCommand(rawArgs, dependencies, io);
    default:
      io.stderr(`Unknown command "${command}".`);
      printGeneralUsage({ stdout: io.stderr });
      return EXIT_USAGE_ERROR;
  }
}
