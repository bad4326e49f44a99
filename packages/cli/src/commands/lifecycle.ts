import type { RevisionState } from '@tessellate/shared';
import { DISABLE_USAGE, EXIT_SUCCESS, RELEASE_USAGE } from '../constants.js';
import { runWithService } from '../execution.js';
import { parseIdCommandArgs } from '../parsing.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

type TransitionCommand = {
  commandName: 'release' | 'disable';
  usage: string;
  targetState: Extract<RevisionState, 'RELEASED' | 'DISABLED'>;
};

async function handleTransitionCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
  command: TransitionCommand,
): Promise<ExitCode> {
  const parsed = parseIdCommandArgs(rawArgs, { commandName: command.commandName, usage: command.usage }, io);
  if (!parsed.ok) {
    return parsed.exitCode;
  }
  const { revisionId } = parsed;

  return runWithService(dependencies, io, `${command.commandName} revision`, ({ service }) => {
    const current = service.getRevision(revisionId);
    if (current.state === command.targetState) {
      io.stdout(`Revision "${revisionId}" is already ${command.targetState}.`);
      return EXIT_SUCCESS;
    }

    const { revision } = service.validateAndStore({ ...current, state: command.targetState });
    const occurredAt = command.targetState === 'RELEASED' ? revision.releasedTimestamp : revision.disabledTimestamp;
    io.stdout(`Revision "${revisionId}" is now ${revision.state} (at ${occurredAt ?? 'unknown time'}).`);
    return EXIT_SUCCESS;
  });
}

export function handleReleaseCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  return handleTransitionCommand(rawArgs, dependencies, io, {
    commandName: 'release',
    usage: RELEASE_USAGE,
    targetState: 'RELEASED',
  });
}

export function handleDisableCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  return handleTransitionCommand(rawArgs, dependencies, io, {
    commandName: 'disable',
    usage: DISABLE_USAGE,
    targetState: 'DISABLED',
  });
}
