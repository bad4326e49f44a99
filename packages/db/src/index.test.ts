import { describe, expect, it } from 'vitest';
import * as db from './index.js';

describe('db index exports', () => {
  it('re-exports database setup, the revision store and schema tables', () => {
    expect(typeof db.createDatabase).toBe('function');
    expect(typeof db.openRevisionDatabase).toBe('function');
    expect(typeof db.migrateDatabase).toBe('function');
    expect(typeof db.createSqlRevisionStore).toBe('function');
    expect(db.transformationRevisions).toBeDefined();
    expect(db.revisionNestings).toBeDefined();
  });
});
