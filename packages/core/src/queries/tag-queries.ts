/**
 * Tag lookup and reconciliation.
 *
 * Tags are created lazily the first time a task references a name and are
 * never deleted here, even once no task points at them.
 */

import { asc, eq } from 'drizzle-orm';
import type { DbExecutor } from '../db.js';
import type { Tag } from '../types/task.js';
import { tags } from '../schema/tags.js';
import { StorageError } from '../errors.js';

/** Exact, case-sensitive lookup */
export function getTagByName(db: DbExecutor, name: string): Tag | null {
  return db.select().from(tags).where(eq(tags.name, name)).get() ?? null;
}

/** All known tags, alphabetical */
export function getAllTags(db: DbExecutor): Tag[] {
  return db.select().from(tags).orderBy(asc(tags.name)).all();
}

/**
 * Insert a tag, or reuse the row another writer created first.
 *
 * ON CONFLICT DO NOTHING returns no row when the name already exists; that is
 * the check-then-create race, and the fix is simply to read the winner.
 */
export function insertTagOrReuse(db: DbExecutor, name: string): Tag {
  const [inserted] = db.insert(tags)
    .values({ name })
    .onConflictDoNothing({ target: tags.name })
    .returning()
    .all();
  if (inserted) return inserted;

  const existing = getTagByName(db, name);
  if (!existing) {
    throw new StorageError('reconcile tags', `tag "${name}" conflicted on insert but could not be read back`);
  }
  return existing;
}

/**
 * Resolve tag names to persisted tags, creating the missing ones.
 * Output follows input order with exact-duplicate names collapsed.
 */
export function reconcileTags(db: DbExecutor, names: readonly string[]): Tag[] {
  const resolved: Tag[] = [];
  const seen = new Set<string>();

  for (const name of names) {
    if (seen.has(name)) continue;
    seen.add(name);
    resolved.push(getTagByName(db, name) ?? insertTagOrReuse(db, name));
  }

  return resolved;
}
