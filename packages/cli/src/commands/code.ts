import { updateComponentCode } from '@tessellate/core';
import { CODE_USAGE, EXIT_SUCCESS, EXIT_USAGE_ERROR } from '../constants.js';
import { runWithService } from '../execution.js';
import { usageError } from '../io.js';
import { parseIdCommandArgs } from '../parsing.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

export async function handleCodeCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsed = parseIdCommandArgs(rawArgs, { commandName: 'code', usage: CODE_USAGE }, io);
  if (!parsed.ok) {
    return parsed.exitCode;
  }

  return runWithService(dependencies, io, 'render component code', ({ service }) => {
    const revision = service.getRevision(parsed.revisionId);
    if (revision.type !== 'COMPONENT') {
      usageError(io, `Revision "${revision.id}" is a workflow; only components carry code.`, CODE_USAGE);
      return EXIT_USAGE_ERROR;
    }

    io.stdout(updateComponentCode(revision.content, revision).trimEnd());
    return EXIT_SUCCESS;
  });
}
