import { renderWorkflowSource, type ExecutableUnit, type ValueSource } from '@tessellate/core';
import { COMPILE_USAGE, EXIT_SUCCESS, EXIT_USAGE_ERROR } from '../constants.js';
import { runWithService } from '../execution.js';
import { parseCompileFormatOption, parseIdCommandArgs } from '../parsing.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

function describeValueSource(source: ValueSource): string {
  switch (source.kind) {
    case 'workflow_input':
      return `input ${source.inputName}`;
    case 'step_output':
      return `step ${source.stepIndex}.${source.outputName}`;
    case 'constant':
      return `constant ${JSON.stringify(source.value)}`;
  }
}

export function formatExecutionPlan(unit: ExecutableUnit): string[] {
  const title = `${unit.name} ${unit.versionTag} (${unit.transformationId})`;
  if (unit.kind === 'component') {
    const inputs = unit.ioInterface.inputs.map(input => input.name).join(', ') || '(none)';
    const outputs = unit.ioInterface.outputs.map(output => output.name).join(', ') || '(none)';
    return [`${title}: component`, `  inputs: ${inputs}`, `  outputs: ${outputs}`];
  }

  const lines = [`${title}: workflow with ${unit.steps.length} step(s)`];
  unit.steps.forEach((step, stepIndex) => {
    const inputs = step.inputs.map(input => `${input.inputName} <- ${describeValueSource(input.source)}`).join(', ');
    lines.push(`  step ${stepIndex}: ${step.operatorName} (${step.operatorId}) -> ${step.unit.transformationId} [${inputs}]`);
  });
  for (const output of unit.outputs) {
    lines.push(`  output ${output.outputName} <- ${describeValueSource(output.source)}`);
  }
  return lines;
}

export async function handleCompileCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsed = parseIdCommandArgs(
    rawArgs,
    { commandName: 'compile', usage: COMPILE_USAGE, extraOptions: ['format'] },
    io,
  );
  if (!parsed.ok) {
    return parsed.exitCode;
  }
  const format = parseCompileFormatOption(parsed.options.get('format'), COMPILE_USAGE, io);
  if (!format.ok) {
    return EXIT_USAGE_ERROR;
  }

  return runWithService(dependencies, io, 'compile revision', ({ service }) => {
    const unit = service.compileForExecution(parsed.revisionId);
    if ((format.value ?? 'plan') === 'plan') {
      for (const line of formatExecutionPlan(unit)) {
        io.stdout(line);
      }
      return EXIT_SUCCESS;
    }

    io.stdout(unit.kind === 'workflow' ? renderWorkflowSource(unit).trimEnd() : unit.code.trimEnd());
    return EXIT_SUCCESS;
  });
}
