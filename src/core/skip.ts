/**
 * Skip engine: decides whether a filtered entry applies to this host.
 *
 * A filter is a list of tags such as `(js, !go)`. A negated tag naming
 * the host always skips. Otherwise a filter with any negated tag applies
 * to every host it does not name, and a filter of only positive tags
 * applies just to the hosts it lists.
 */

/** A parsed filter prefix. */
export interface Filter {
  /** Tags listed without `!`. */
  include: string[];
  /** Tags listed with `!`, stored without the marker. */
  exclude: string[];
}

const TAG_PATTERN = /^!?[A-Za-z0-9_-]+$/;

/**
 * Parse the inside of a `( ... )` filter prefix. Tags are separated by
 * `,` or `|`. Returns null when any tag is not well formed.
 */
export function parseFilter(body: string): Filter | null {
  const tags = body
    .split(/[,|]/)
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);

  if (tags.length === 0) return null;

  const filter: Filter = { include: [], exclude: [] };
  for (const tag of tags) {
    if (!TAG_PATTERN.test(tag)) return null;
    if (tag.startsWith('!')) {
      filter.exclude.push(tag.slice(1));
    } else {
      filter.include.push(tag);
    }
  }
  return filter;
}

/** True when the entry carrying `filter` must be skipped on host `tag`. */
export function shouldSkip(filter: Filter, tag: string): boolean {
  if (filter.exclude.includes(tag)) return true;
  if (filter.exclude.length > 0) return false;
  return !filter.include.includes(tag);
}

/**
 * Tracks the skip state a filtered comment hands down to the features
 * after it.
 */
export class SkipState {
  private readonly tag: string;
  private inherited = false;

  constructor(tag: string) {
    this.tag = tag;
  }

  /** A comment resets the inherited state: its own filter, or nothing. */
  enterComment(filter: Filter | null): boolean {
    this.inherited = filter !== null && shouldSkip(filter, this.tag);
    return this.inherited;
  }

  /** A feature's own filter wins over the inherited state. */
  resolveFeature(filter: Filter | null): boolean {
    if (filter !== null) return shouldSkip(filter, this.tag);
    return this.inherited;
  }
}
