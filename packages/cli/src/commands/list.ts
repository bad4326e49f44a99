import { EXIT_SUCCESS, EXIT_USAGE_ERROR, LIST_USAGE } from '../constants.js';
import { runWithService } from '../execution.js';
import { parseRevisionStateOption, parseTransformationTypeOption, validateCommandOptions } from '../parsing.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

export async function handleListCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsedOptions = validateCommandOptions(
    rawArgs,
    {
      commandName: 'list',
      usage: LIST_USAGE,
      allowedOptions: ['type', 'state'],
    },
    io,
  );
  if (!parsedOptions.ok) {
    return parsedOptions.exitCode;
  }

  const type = parseTransformationTypeOption(parsedOptions.options.get('type'), LIST_USAGE, io);
  if (!type.ok) {
    return EXIT_USAGE_ERROR;
  }
  const state = parseRevisionStateOption(parsedOptions.options.get('state'), LIST_USAGE, io);
  if (!state.ok) {
    return EXIT_USAGE_ERROR;
  }

  return runWithService(dependencies, io, 'list revisions', ({ service }) => {
    const revisions = service.listRevisions({ type: type.value, state: state.value });
    if (revisions.length === 0) {
      io.stdout('No transformation revisions found.');
      return EXIT_SUCCESS;
    }

    for (const revision of revisions) {
      io.stdout(`${revision.id}\t${revision.type}\t${revision.state}\t${revision.name}\t${revision.versionTag}`);
    }
    return EXIT_SUCCESS;
  });
}
