import { toRevisionDocument } from '@tessellate/core';
import { EXIT_SUCCESS, SHOW_USAGE } from '../constants.js';
import { runWithService } from '../execution.js';
import { parseIdCommandArgs } from '../parsing.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

export async function handleShowCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsed = parseIdCommandArgs(rawArgs, { commandName: 'show', usage: SHOW_USAGE }, io);
  if (!parsed.ok) {
    return parsed.exitCode;
  }

  return runWithService(dependencies, io, 'show revision', ({ service }) => {
    io.stdout(JSON.stringify(toRevisionDocument(service.getRevision(parsed.revisionId)), null, 2));
    return EXIT_SUCCESS;
  });
}
