/**
 * Splits comma-separated tag lists (`?tags=docs,urgent`, `--tags docs,urgent`)
 * into names. Whitespace around each name is dropped, empty segments are
 * skipped and repeats collapse to the first occurrence. Matching stays
 * case-sensitive: `Docs` and `docs` are different tags.
 */
export function parseTagList(input: string | null | undefined): string[] {
  if (!input) return [];

  const names: string[] = [];
  for (const segment of input.split(',')) {
    const name = segment.trim();
    if (name.length > 0 && !names.includes(name)) names.push(name);
  }
  return names;
}
