import { sql } from 'drizzle-orm';
import type { TessellateDatabase } from './connection.js';

export function migrateDatabase(db: TessellateDatabase): void {
  db.run(sql`CREATE TABLE IF NOT EXISTS transformation_revisions (
    id TEXT PRIMARY KEY,
    revision_group_id TEXT NOT NULL,
    type TEXT NOT NULL,
    name TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    category TEXT NOT NULL DEFAULT '',
    documentation TEXT NOT NULL DEFAULT '',
    version_tag TEXT NOT NULL,
    state TEXT NOT NULL DEFAULT 'DRAFT',
    released_timestamp TEXT,
    disabled_timestamp TEXT,
    io_interface TEXT NOT NULL,
    component_code TEXT,
    workflow_content TEXT,
    test_wiring TEXT NOT NULL,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now')),
    updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now')),
    CONSTRAINT transformation_revisions_type_ck
      CHECK (type IN ('COMPONENT', 'WORKFLOW')),
    CONSTRAINT transformation_revisions_state_ck
      CHECK (state IN ('DRAFT', 'RELEASED', 'DISABLED')),
    CONSTRAINT transformation_revisions_content_ck
      CHECK (
        (type = 'COMPONENT' AND component_code IS NOT NULL AND workflow_content IS NULL)
        OR
        (type = 'WORKFLOW' AND workflow_content IS NOT NULL AND component_code IS NULL)
      ),
    CONSTRAINT transformation_revisions_released_timestamp_ck
      CHECK (state = 'DRAFT' OR released_timestamp IS NOT NULL),
    CONSTRAINT transformation_revisions_disabled_timestamp_ck
      CHECK (
        (state = 'DISABLED' AND disabled_timestamp IS NOT NULL)
        OR
        (state <> 'DISABLED' AND disabled_timestamp IS NULL)
      )
  )`);
  db.run(sql`CREATE UNIQUE INDEX IF NOT EXISTS transformation_revisions_group_version_tag_uq
    ON transformation_revisions(revision_group_id, version_tag)`);
  db.run(sql`CREATE INDEX IF NOT EXISTS transformation_revisions_name_idx
    ON transformation_revisions(name)`);

  db.run(sql`CREATE TABLE IF NOT EXISTS revision_nestings (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    workflow_id TEXT NOT NULL REFERENCES transformation_revisions(id) ON DELETE CASCADE,
    descendant_id TEXT NOT NULL,
    via_operator_path TEXT NOT NULL,
    depth INTEGER NOT NULL,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now')),
    CONSTRAINT revision_nestings_depth_ck
      CHECK (depth >= 1)
  )`);
  db.run(sql`CREATE UNIQUE INDEX IF NOT EXISTS revision_nestings_workflow_path_uq
    ON revision_nestings(workflow_id, via_operator_path)`);
  db.run(sql`CREATE INDEX IF NOT EXISTS revision_nestings_descendant_idx
    ON revision_nestings(descendant_id)`);
}
