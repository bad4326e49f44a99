import { DELETE_USAGE, EXIT_SUCCESS } from '../constants.js';
import { runWithService } from '../execution.js';
import { parseIdCommandArgs } from '../parsing.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

export async function handleDeleteCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsed = parseIdCommandArgs(rawArgs, { commandName: 'delete', usage: DELETE_USAGE }, io);
  if (!parsed.ok) {
    return parsed.exitCode;
  }

  return runWithService(dependencies, io, 'delete revision', ({ service }) => {
    service.deleteRevision(parsed.revisionId);
    io.stdout(`Deleted revision "${parsed.revisionId}".`);
    return EXIT_SUCCESS;
  });
}
