import { dataTypes, revisionStates, type ComponentRevision, type IoConnector } from '@tessellate/shared';
import { z } from 'zod';
import { RevisionDocumentError } from './errors.js';

export const generatedHeaderStart = '// ***** DO NOT EDIT LINES BELOW *****';
export const generatedHeaderEnd = '// ***** DO NOT EDIT LINES ABOVE *****';

const componentInfoPrefix = 'export const COMPONENT_INFO = ';

const infoConnectorSchema = z.object({
  name: z.string(),
  data_type: z.enum(dataTypes),
});

const componentInfoSchema = z.object({
  inputs: z.array(infoConnectorSchema),
  outputs: z.array(infoConnectorSchema),
  name: z.string(),
  category: z.string(),
  description: z.string(),
  version_tag: z.string(),
  id: z.string(),
  revision_group_id: z.string(),
  state: z.enum(revisionStates),
  released_timestamp: z.string().nullable(),
});

export type ComponentInfo = z.infer<typeof componentInfoSchema>;

type ComponentHeaderSource = Pick<
  ComponentRevision,
  | 'id'
  | 'revisionGroupId'
  | 'name'
  | 'category'
  | 'description'
  | 'versionTag'
  | 'state'
  | 'releasedTimestamp'
  | 'ioInterface'
>;

function toInfoConnectors(connectors: readonly IoConnector[]): ComponentInfo['inputs'] {
  return connectors.map(connector => ({ name: connector.name, data_type: connector.dataType }));
}

export function toComponentInfo(revision: ComponentHeaderSource): ComponentInfo {
  return {
    inputs: toInfoConnectors(revision.ioInterface.inputs),
    outputs: toInfoConnectors(revision.ioInterface.outputs),
    name: revision.name,
    category: revision.category,
    description: revision.description,
    version_tag: revision.versionTag,
    id: revision.id,
    revision_group_id: revision.revisionGroupId,
    state: revision.state,
    released_timestamp: revision.releasedTimestamp,
  };
}

const identifierPattern = /^[A-Za-z_$][\w$]*$/;

function renderMainSignature(inputs: readonly IoConnector[]): string {
  if (inputs.length === 0) {
    return 'export async function main() {';
  }
  if (inputs.every(input => identifierPattern.test(input.name))) {
    return `export async function main({ ${inputs.map(input => input.name).join(', ')} }) {`;
  }
  return 'export async function main(inputs) {';
}

function renderHeader(revision: ComponentHeaderSource): string {
  return [
    generatedHeaderStart,
    '// These lines may be overwritten if component details or inputs/outputs change.',
    `${componentInfoPrefix}${JSON.stringify(toComponentInfo(revision), null, 2)};`,
    '',
    renderMainSignature(revision.ioInterface.inputs),
    '  // entrypoint function for this component',
    `  ${generatedHeaderEnd}`,
  ].join('\n');
}

/**
 * Scaffolds component code whose header mirrors the revision's interface and
 * metadata, followed by an empty body for the user to fill in.
 */
export function generateComponentCode(revision: ComponentHeaderSource): string {
  return [renderHeader(revision), '  // write your function code here.', '  return {};', '}', ''].join('\n');
}

function locateHeader(code: string): { start: number; end: number } | null {
  const start = code.indexOf(generatedHeaderStart);
  if (start === -1) {
    return null;
  }
  const endMarker = code.indexOf(generatedHeaderEnd, start);
  if (endMarker === -1) {
    return null;
  }
  return { start, end: endMarker + generatedHeaderEnd.length };
}

/**
 * Regenerates the header of existing component code in place and keeps the
 * user-written body. Code without a generated header is replaced by a fresh scaffold.
 */
export function updateComponentCode(code: string, revision: ComponentHeaderSource): string {
  const header = locateHeader(code);
  if (!header) {
    return generateComponentCode(revision);
  }
  return `${code.slice(0, header.start)}${renderHeader(revision)}${code.slice(header.end)}`;
}

export function readComponentInfo(code: string): ComponentInfo | null {
  const header = locateHeader(code);
  if (!header) {
    return null;
  }

  const region = code.slice(header.start, header.end);
  const prefixIndex = region.indexOf(componentInfoPrefix);
  if (prefixIndex === -1) {
    return null;
  }
  const jsonStart = prefixIndex + componentInfoPrefix.length;
  const jsonEnd = region.indexOf('\n};', jsonStart);
  if (jsonEnd === -1) {
    throw new RevisionDocumentError(['COMPONENT_INFO in the generated header is not terminated']);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(region.slice(jsonStart, jsonEnd + 2));
  } catch (error) {
    throw new RevisionDocumentError([`COMPONENT_INFO is not valid JSON: ${error instanceof Error ? error.message : String(error)}`]);
  }

  const result = componentInfoSchema.safeParse(parsed);
  if (!result.success) {
    throw new RevisionDocumentError(
      result.error.issues.map(issue => `COMPONENT_INFO.${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return result.data;
}
