import { EXIT_SUCCESS, NESTING_USAGE } from '../constants.js';
import { runWithService } from '../execution.js';
import { parseIdCommandArgs } from '../parsing.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

export async function handleNestingCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsed = parseIdCommandArgs(rawArgs, { commandName: 'nesting', usage: NESTING_USAGE }, io);
  if (!parsed.ok) {
    return parsed.exitCode;
  }
  const { revisionId } = parsed;

  return runWithService(dependencies, io, 'read nesting', ({ service }) => {
    const rows = service.listNesting(revisionId);
    if (rows.length === 0) {
      io.stdout(`Revision "${revisionId}" has no nested revisions.`);
    } else {
      io.stdout(`Nested revisions of "${revisionId}":`);
      for (const row of rows) {
        io.stdout(`  ${row.descendantId} depth=${row.depth} via=${row.viaOperatorPath.join(' > ')}`);
      }
    }

    const users = service.usedBy(revisionId);
    io.stdout(`Used by: ${users.length > 0 ? users.join(', ') : '(none)'}`);
    return EXIT_SUCCESS;
  });
}
