import { describe, it, expect, beforeEach } from 'vitest';
import { createTestDb, getRawDb, type AppDb } from '../../src/db.js';
import { getAllTags, getTagByName, insertTagOrReuse, reconcileTags } from '../../src/queries/tag-queries.js';

let db: AppDb;

beforeEach(() => {
  db = createTestDb();
});

function tagRowCount(): unknown {
  return getRawDb(db).prepare('SELECT COUNT(*) AS n FROM tags').get();
}

describe('reconcileTags', () => {
  it('creates missing tags in input order', () => {
    const resolved = reconcileTags(db, ['docs', 'urgent']);
    expect(resolved.map(t => t.name)).toEqual(['docs', 'urgent']);
    expect(tagRowCount()).toEqual({ n: 2 });
  });

  it('reuses existing tags', () => {
    const [first] = reconcileTags(db, ['docs']);
    const [again] = reconcileTags(db, ['docs']);
    expect(again?.id).toBe(first?.id);
    expect(tagRowCount()).toEqual({ n: 1 });
  });

  it('collapses exact duplicates', () => {
    const resolved = reconcileTags(db, ['a', 'b', 'a']);
    expect(resolved.map(t => t.name)).toEqual(['a', 'b']);
  });

  it('treats names case-sensitively', () => {
    const resolved = reconcileTags(db, ['Docs', 'docs']);
    expect(resolved).toHaveLength(2);
    expect(resolved[0]?.id).not.toBe(resolved[1]?.id);
  });

  it('returns an empty list for no names', () => {
    expect(reconcileTags(db, [])).toEqual([]);
  });
});

describe('insertTagOrReuse', () => {
  it('inserts a new tag', () => {
    const tag = insertTagOrReuse(db, 'docs');
    expect(tag.name).toBe('docs');
    expect(getTagByName(db, 'docs')).toEqual(tag);
  });

  it('returns the existing row when the name was taken first', () => {
    getRawDb(db).prepare('INSERT INTO tags (name) VALUES (?)').run('docs');
    const existing = getTagByName(db, 'docs');

    const tag = insertTagOrReuse(db, 'docs');

    expect(tag).toEqual(existing);
    expect(tagRowCount()).toEqual({ n: 1 });
  });
});

describe('getTagByName', () => {
  it('returns null for an unknown name', () => {
    expect(getTagByName(db, 'missing')).toBeNull();
  });
});

describe('getAllTags', () => {
  it('lists tags alphabetically', () => {
    reconcileTags(db, ['zeta', 'alpha']);
    expect(getAllTags(db).map(t => t.name)).toEqual(['alpha', 'zeta']);
  });
});
