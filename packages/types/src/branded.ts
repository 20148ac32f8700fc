/**
 * Branded identifiers - keep arena indices and tracker ids apart
 *
 * A NodeIndex is a plain number at runtime and a TrackerId a plain string,
 * but the brands stop one from being passed where the other is expected
 * (or a line number where a node index is expected).
 *
 * @example
 * const idx = toNodeIndex(3);
 * tree.node(idx);        // OK
 * tree.node(3);          // ERROR - not a NodeIndex
 */

/**
 * Unique symbols for branding.
 * Declared but never actually exist at runtime - purely for type checking.
 */
declare const NODE_INDEX_BRAND: unique symbol;
declare const TRACKER_ID_BRAND: unique symbol;

/** Position of a node inside a DecoratedTree arena */
export type NodeIndex = number & { readonly [NODE_INDEX_BRAND]: true };

/** Identifier of one counter slot in the external counter store */
export type TrackerId = string & { readonly [TRACKER_ID_BRAND]: true };

/**
 * Brand an arena position. Only the tree builder should mint these.
 *
 * @internal
 */
export function toNodeIndex(value: number): NodeIndex {
  return value as NodeIndex;
}

/**
 * Brand a counter slot name read from a tree document or counter file.
 */
export function toTrackerId(value: string): TrackerId {
  return value as TrackerId;
}
