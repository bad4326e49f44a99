export const EXIT_SUCCESS = 0;
export const EXIT_USAGE_ERROR = 2;
export const EXIT_NOT_FOUND = 3;
export const EXIT_RUNTIME_ERROR = 4;

export const DEFAULT_DATABASE_FILE = 'tessellate.db';

export const IMPORT_USAGE = 'Usage: tessellate import <file> [--allow-overwrite-released]';
export const LIST_USAGE = 'Usage: tessellate list [--type <COMPONENT|WORKFLOW>] [--state <DRAFT|RELEASED|DISABLED>]';
export const SHOW_USAGE = 'Usage: tessellate show --id <revision_id>';
export const NESTING_USAGE = 'Usage: tessellate nesting --id <workflow_id>';
export const COMPILE_USAGE = 'Usage: tessellate compile --id <revision_id> [--format <plan|source>]';
export const RELEASE_USAGE = 'Usage: tessellate release --id <revision_id>';
export const DISABLE_USAGE = 'Usage: tessellate disable --id <revision_id>';
export const DELETE_USAGE = 'Usage: tessellate delete --id <revision_id>';
export const CODE_USAGE = 'Usage: tessellate code --id <component_id>';
