import { resolve } from 'node:path';
import { parseRevisionDocuments, type StoredRevision } from '@tessellate/core';
import type { TransformationRevision } from '@tessellate/shared';
import { EXIT_RUNTIME_ERROR, EXIT_SUCCESS, IMPORT_USAGE } from '../constants.js';
import { runWithService } from '../execution.js';
import { toErrorMessage } from '../io.js';
import { validateCommandOptions } from '../parsing.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

export function formatStoredRevision({ revision, writeKind }: StoredRevision): string {
  return `Stored ${revision.type} "${revision.id}" (${revision.name} ${revision.versionTag}) state=${revision.state} write=${writeKind}.`;
}

export async function handleImportCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsedOptions = validateCommandOptions(
    rawArgs,
    {
      commandName: 'import',
      usage: IMPORT_USAGE,
      allowedOptions: ['allow-overwrite-released'],
      flagOptions: ['allow-overwrite-released'],
      positionalCount: 1,
    },
    io,
  );
  if (!parsedOptions.ok) {
    return parsedOptions.exitCode;
  }

  const [file] = parsedOptions.positionals;
  const allowOverwriteReleased = parsedOptions.options.get('allow-overwrite-released') === 'true';

  let revisions: TransformationRevision[];
  try {
    const text = await dependencies.readTextFile(resolve(io.cwd, file));
    revisions = parseRevisionDocuments(JSON.parse(text));
  } catch (error) {
    io.stderr(`Failed to read revision documents from "${file}": ${toErrorMessage(error)}`);
    return EXIT_RUNTIME_ERROR;
  }

  // Documents are stored in file order, so referenced revisions must come first.
  return runWithService(dependencies, io, 'import revisions', ({ service }) => {
    for (const revision of revisions) {
      io.stdout(formatStoredRevision(service.validateAndStore(revision, allowOverwriteReleased)));
    }
    io.stdout(`Imported ${revisions.length} revision(s) from "${file}".`);
    return EXIT_SUCCESS;
  });
}
