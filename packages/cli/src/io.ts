import { EXIT_USAGE_ERROR } from './constants.js';
import type { CliIo, ExitCode } from './types.js';

export function createDefaultIo(): CliIo {
  return {
    stdout: message => console.log(message),
    stderr: message => console.error(message),
    cwd: process.cwd(),
    env: process.env,
  };
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

export function printGeneralUsage(io: Pick<CliIo, 'stdout'>): void {
  io.stdout('Tessellate - transformation revision manager');
  io.stdout('');
  io.stdout('Usage: tessellate <command> [options]');
  io.stdout('');
  io.stdout('Commands:');
  io.stdout('  import <file> [--allow-overwrite-released]');
  io.stdout('                             Validate and store revision documents from a JSON file');
  io.stdout('  list [--type <type>] [--state <state>]');
  io.stdout('                             List stored revisions');
  io.stdout('  show --id <revision_id>    Print a revision as a JSON document');
  io.stdout('  nesting --id <workflow_id> Show nested revisions and the workflows using it');
  io.stdout('  compile --id <revision_id> [--format <plan|source>]');
  io.stdout('                             Compile a revision into an executable unit');
  io.stdout('  release --id <revision_id> Release a draft revision');
  io.stdout('  disable --id <revision_id> Disable a released revision');
  io.stdout('  delete --id <revision_id>  Delete a revision no active workflow uses');
  io.stdout('  code --id <component_id>   Print component code with a regenerated header');
  io.stdout('');
  io.stdout('Environment:');
  io.stdout('  TESSELLATE_DB_PATH           Database file (default: tessellate.db)');
  io.stdout('  TESSELLATE_LOG_LEVEL         trace|debug|info|warn|error|fatal|silent (default: info)');
  io.stdout('  TESSELLATE_MAX_NESTING_DEPTH Maximum nested workflow levels (default: 64)');
}

export function usageError(io: Pick<CliIo, 'stderr'>, message: string, usage: string): ExitCode {
  io.stderr(message);
  io.stderr(usage);
  return EXIT_USAGE_ERROR;
}
