import type { Document } from "mongodb";
import type { FilterBound } from "./BookmarkManager.js";
import { decodeKey } from "./ReplicationKey.js";
import type { Query } from "./types.js";

/**
 * `{ key: { $gte: bookmark } }` when the stream has a bookmark, otherwise
 * an unconstrained filter. The bound is inclusive: the bookmarked row is
 * read again on resume.
 */
export function buildFilter(bound: FilterBound | undefined): Document {
  if (!bound) return {};
  return { [bound.keyName]: { $gte: decodeKey(bound.value, bound.type) } };
}

export function buildQuery(
  bound: FilterBound | undefined,
  keyName: string,
  projection?: Document
): Query {
  const query: Query = {
    filter: buildFilter(bound),
    sort: { [keyName]: 1 },
  };
  if (projection) {
    query.projection = projection;
  }
  return query;
}
