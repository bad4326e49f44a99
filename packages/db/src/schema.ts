import type { IoInterface, TestWiring, WorkflowGraph } from '@tessellate/shared';
import { sql } from 'drizzle-orm';
import { check, index, integer, sqliteTable, text, uniqueIndex } from 'drizzle-orm/sqlite-core';

const utcNow = sql`(strftime('%Y-%m-%dT%H:%M:%fZ','now'))`;

export const transformationRevisions = sqliteTable(
  'transformation_revisions',
  {
    id: text('id').primaryKey(),
    revisionGroupId: text('revision_group_id').notNull(),
    type: text('type').notNull(),
    name: text('name').notNull(),
    description: text('description').notNull().default(''),
    category: text('category').notNull().default(''),
    documentation: text('documentation').notNull().default(''),
    versionTag: text('version_tag').notNull(),
    state: text('state').notNull().default('DRAFT'),
    releasedTimestamp: text('released_timestamp'),
    disabledTimestamp: text('disabled_timestamp'),
    ioInterface: text('io_interface', { mode: 'json' }).$type<IoInterface>().notNull(),
    componentCode: text('component_code'),
    workflowContent: text('workflow_content', { mode: 'json' }).$type<WorkflowGraph>(),
    testWiring: text('test_wiring', { mode: 'json' }).$type<TestWiring>().notNull(),
    createdAt: text('created_at').notNull().default(utcNow),
    updatedAt: text('updated_at').notNull().default(utcNow),
  },
  table => ({
    groupVersionTagUnique: uniqueIndex('transformation_revisions_group_version_tag_uq').on(
      table.revisionGroupId,
      table.versionTag,
    ),
    typeCheck: check('transformation_revisions_type_ck', sql`${table.type} in ('COMPONENT', 'WORKFLOW')`),
    stateCheck: check(
      'transformation_revisions_state_ck',
      sql`${table.state} in ('DRAFT', 'RELEASED', 'DISABLED')`,
    ),
    contentCheck: check(
      'transformation_revisions_content_ck',
      sql`(
        ${table.type} = 'COMPONENT' and ${table.componentCode} is not null and ${table.workflowContent} is null
      ) or (
        ${table.type} = 'WORKFLOW' and ${table.workflowContent} is not null and ${table.componentCode} is null
      )`,
    ),
    releasedTimestampCheck: check(
      'transformation_revisions_released_timestamp_ck',
      sql`${table.state} = 'DRAFT' or ${table.releasedTimestamp} is not null`,
    ),
    disabledTimestampCheck: check(
      'transformation_revisions_disabled_timestamp_ck',
      sql`(
        ${table.state} = 'DISABLED' and ${table.disabledTimestamp} is not null
      ) or (
        ${table.state} <> 'DISABLED' and ${table.disabledTimestamp} is null
      )`,
    ),
    nameIdx: index('transformation_revisions_name_idx').on(table.name),
  }),
);

export const revisionNestings = sqliteTable(
  'revision_nestings',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    workflowId: text('workflow_id')
      .notNull()
      .references(() => transformationRevisions.id, { onDelete: 'cascade' }),
    // No foreign key: rows may name a descendant that has since been deleted.
    descendantId: text('descendant_id').notNull(),
    viaOperatorPath: text('via_operator_path', { mode: 'json' }).$type<string[]>().notNull(),
    depth: integer('depth').notNull(),
    createdAt: text('created_at').notNull().default(utcNow),
  },
  table => ({
    workflowPathUnique: uniqueIndex('revision_nestings_workflow_path_uq').on(table.workflowId, table.viaOperatorPath),
    depthCheck: check('revision_nestings_depth_ck', sql`${table.depth} >= 1`),
    descendantIdx: index('revision_nestings_descendant_idx').on(table.descendantId),
  }),
);
