import {
  revisionStates,
  transformationTypes,
  type RevisionState,
  type TransformationType,
} from '@tessellate/shared';
import { EXIT_USAGE_ERROR } from './constants.js';
import { usageError } from './io.js';
import type {
  CliIo,
  CommandValidationConfig,
  ExitCode,
  ParsedLongOptionToken,
  ParsedOptions,
  ValidatedCommandOptions,
} from './types.js';

export function parseLongOptionToken(arg: string, flagOptions: ReadonlySet<string>): ParsedLongOptionToken {
  if (!arg.startsWith('--')) {
    return {
      kind: 'positional',
      value: arg,
    };
  }

  if (arg === '--') {
    return {
      kind: 'separator',
    };
  }

  const equalsIndex = arg.indexOf('=');
  const hasInlineValue = equalsIndex >= 0;
  const optionName = hasInlineValue ? arg.slice(2, equalsIndex) : arg.slice(2);
  if (optionName.length === 0) {
    return {
      kind: 'error',
      message: 'Option name cannot be empty.',
    };
  }

  if (!hasInlineValue) {
    if (flagOptions.has(optionName)) {
      return {
        kind: 'flag',
        optionName,
      };
    }

    return {
      kind: 'option-next',
      optionName,
    };
  }

  const optionValue = arg.slice(equalsIndex + 1);
  if (optionValue.length === 0) {
    return {
      kind: 'error',
      message: `Option "--${optionName}" requires a value.`,
    };
  }

  return {
    kind: 'option-inline',
    optionName,
    optionValue,
  };
}

export function parseLongOptions(
  args: readonly string[],
  parseOptions: {
    flagOptions?: readonly string[];
  } = {},
): ParsedOptions {
  const flagOptions = new Set(parseOptions.flagOptions ?? []);
  const resolvedOptions = new Map<string, string>();
  const positionals: string[] = [];

  let cursor = 0;
  while (cursor < args.length) {
    const parsedToken = parseLongOptionToken(args[cursor], flagOptions);
    if (parsedToken.kind === 'error') {
      return {
        ok: false,
        message: parsedToken.message,
      };
    }

    if (parsedToken.kind === 'separator') {
      positionals.push(...args.slice(cursor + 1));
      break;
    }

    if (parsedToken.kind === 'positional') {
      positionals.push(parsedToken.value);
      cursor += 1;
      continue;
    }

    const { optionName } = parsedToken;
    if (resolvedOptions.has(optionName)) {
      return {
        ok: false,
        message: `Option "--${optionName}" cannot be provided more than once.`,
      };
    }

    if (parsedToken.kind === 'option-inline') {
      resolvedOptions.set(optionName, parsedToken.optionValue);
      cursor += 1;
      continue;
    }

    if (parsedToken.kind === 'flag') {
      resolvedOptions.set(optionName, 'true');
      cursor += 1;
      continue;
    }

    const optionValue = args[cursor + 1];
    if (!optionValue || optionValue.startsWith('--')) {
      return {
        ok: false,
        message: `Option "--${optionName}" requires a value.`,
      };
    }

    resolvedOptions.set(optionName, optionValue);
    cursor += 2;
  }

  return {
    ok: true,
    options: resolvedOptions,
    positionals,
  };
}

export function validateCommandOptions(
  rawArgs: readonly string[],
  config: CommandValidationConfig,
  io: Pick<CliIo, 'stderr'>,
): ValidatedCommandOptions {
  const parsedOptions = parseLongOptions(rawArgs, {
    flagOptions: config.flagOptions,
  });
  if (!parsedOptions.ok) {
    return {
      ok: false,
      exitCode: usageError(io, parsedOptions.message, config.usage),
    };
  }

  const { options, positionals } = parsedOptions;
  const expectedPositionals = config.positionalCount ?? 0;
  if (positionals.length > expectedPositionals) {
    return {
      ok: false,
      exitCode: usageError(
        io,
        `Unexpected positional arguments for "${config.commandName}": ${positionals.join(' ')}`,
        config.usage,
      ),
    };
  }
  if (positionals.length < expectedPositionals) {
    return {
      ok: false,
      exitCode: usageError(
        io,
        `Missing required positional argument for "${config.commandName}".`,
        config.usage,
      ),
    };
  }

  const allowedOptions = new Set(config.allowedOptions);
  for (const optionName of options.keys()) {
    if (allowedOptions.has(optionName)) {
      continue;
    }
    return {
      ok: false,
      exitCode: usageError(io, `Unknown option for "${config.commandName}": --${optionName}`, config.usage),
    };
  }

  return {
    ok: true,
    options,
    positionals,
  };
}

export function getRequiredOption(
  options: ReadonlyMap<string, string>,
  optionName: string,
  optionDescription: string,
  usage: string,
  io: Pick<CliIo, 'stderr'>,
): string | null {
  const value = options.get(optionName);
  if (value) {
    return value;
  }

  usageError(io, `Missing required option: --${optionName} <${optionDescription}>`, usage);
  return null;
}

export const compileFormats = ['plan', 'source'] as const;
export type CompileFormat = (typeof compileFormats)[number];

type OptionChoice<T extends string> = { ok: true; value: T | undefined } | { ok: false };

function parseChoice<T extends string>(
  value: string | undefined,
  choices: readonly T[],
  optionName: string,
  usage: string,
  io: Pick<CliIo, 'stderr'>,
): OptionChoice<T> {
  if (value === undefined) {
    return { ok: true, value: undefined };
  }

  const choice = choices.find(candidate => candidate === value);
  if (choice === undefined) {
    usageError(io, `Option "--${optionName}" must be one of: ${choices.join(', ')}.`, usage);
    return { ok: false };
  }
  return { ok: true, value: choice };
}

export function parseTransformationTypeOption(
  value: string | undefined,
  usage: string,
  io: Pick<CliIo, 'stderr'>,
): OptionChoice<TransformationType> {
  return parseChoice(value?.toUpperCase(), transformationTypes, 'type', usage, io);
}

export function parseRevisionStateOption(
  value: string | undefined,
  usage: string,
  io: Pick<CliIo, 'stderr'>,
): OptionChoice<RevisionState> {
  return parseChoice(value?.toUpperCase(), revisionStates, 'state', usage, io);
}

export function parseCompileFormatOption(
  value: string | undefined,
  usage: string,
  io: Pick<CliIo, 'stderr'>,
): OptionChoice<CompileFormat> {
  return parseChoice(value, compileFormats, 'format', usage, io);
}

export type ParsedIdCommand =
  | {
      ok: true;
      revisionId: string;
      options: Map<string, string>;
    }
  | {
      ok: false;
      exitCode: ExitCode;
    };

/** Validates a command addressed by `--id <revision_id>` plus any extra options. */
export function parseIdCommandArgs(
  rawArgs: readonly string[],
  config: Omit<CommandValidationConfig, 'allowedOptions' | 'positionalCount'> & { extraOptions?: readonly string[] },
  io: Pick<CliIo, 'stderr'>,
): ParsedIdCommand {
  const parsedOptions = validateCommandOptions(
    rawArgs,
    {
      commandName: config.commandName,
      usage: config.usage,
      allowedOptions: ['id', ...(config.extraOptions ?? [])],
      flagOptions: config.flagOptions,
    },
    io,
  );
  if (!parsedOptions.ok) {
    return parsedOptions;
  }

  const revisionId = getRequiredOption(parsedOptions.options, 'id', 'revision_id', config.usage, io);
  if (!revisionId) {
    return { ok: false, exitCode: EXIT_USAGE_ERROR };
  }
  return { ok: true, revisionId, options: parsedOptions.options };
}
