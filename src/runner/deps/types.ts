/* src/runner/deps/types.ts
 * Dependency graph schema: an arena of nodes keyed by id with explicit edge lists.
 * Node ids are absolute script paths or `pkg:<name>` for package requirements.
 */

export type NodeId = string;

export type DepNodeKind = 'file' | 'package';

export type DepNode = {
  id: NodeId;
  kind: DepNodeKind;
  /** Display label: path relative to the root's directory, or the package name. */
  label: string;
  exists: boolean;
};

export type IncludeStatement = 'do' | 'run' | 'include';
export type RequireStatement = 'ssc' | 'net' | 'github' | 'require';

export type DepEdge = {
  target: NodeId;
  statement: IncludeStatement | RequireStatement;
  /** 1-based line of the referencing statement. */
  line: number;
  /** Target was still on the expansion path when reached. */
  circular?: true;
  /** Requirement wrapped in capture (non-fatal when missing). */
  guarded?: true;
};

export type DependencyGraph = {
  root: NodeId;
  nodes: Record<NodeId, DepNode>;
  edges: Record<NodeId, DepEdge[]>;
  /** Each cycle as a closed path of node ids (first id repeated at the end). */
  cycles: NodeId[][];
};

/** Tree view: first-discovery order, duplicates preserved, cycles not expanded. */
export type DepTreeNode = DepNode & {
  statement?: DepEdge['statement'];
  line?: number;
  circular: boolean;
  guarded: boolean;
  children: DepTreeNode[];
};

export type FlatDependency = {
  id: NodeId;
  label: string;
  kind: DepNodeKind;
  depth: number;
  exists: boolean;
};

export type DependencySummary = {
  uniqueCount: number;
  hasCircular: boolean;
  circularCount: number;
  circularPaths: string[];
  missingCount: number;
  missingPaths: string[];
  packages: Array<{ name: string; guarded: boolean }>;
};
