import type { KeyPath } from "@matgraph/core/key-path";

export { DEFAULT_MAX_DEPTH } from "@matgraph/core/configuration";

export interface WalkOptions {
  maxDepth: number;
  /** Properties for which this returns true are neither read nor written. */
  isExcluded?: (path: KeyPath) => boolean;
}

/**
 * Per-traversal state, owned by the walk of one top-level material.
 */
export interface VisitState<TNode> {
  /** Nodes on the path from the material to the node being visited. */
  visitedOnPath: Set<TNode>;
  depth: number;
}

export interface WalkReport {
  properties: number;
  readFailures: number;
  introspectionFailures: number;
  coercionFailures: number;
  cycles: number;
  depthLimited: number;
}

export const emptyWalkReport = (): WalkReport => ({
  properties: 0,
  readFailures: 0,
  introspectionFailures: 0,
  coercionFailures: 0,
  cycles: 0,
  depthLimited: 0,
});
