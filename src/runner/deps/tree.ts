/* src/runner/deps/tree.ts
 * Views over a DependencyGraph: tree, flat list, summary and text rendering.
 */
import type {
  DepEdge,
  DependencyGraph,
  DependencySummary,
  DepTreeNode,
  FlatDependency,
  NodeId,
} from './types';

const nodeOf = (graph: DependencyGraph, id: NodeId) => {
  const n = graph.nodes[id];
  if (!n) throw new Error(`dependency graph has no node ${id}`);
  return n;
};

/** Expand the graph into a tree. Circular edges appear once and stop. */
export const toTree = (graph: DependencyGraph): DepTreeNode => {
  const expand = (id: NodeId, via?: DepEdge): DepTreeNode => {
    const node = nodeOf(graph, id);
    const circular = via?.circular === true;
    return {
      ...node,
      ...(via ? { statement: via.statement, line: via.line } : {}),
      circular,
      guarded: via?.guarded === true,
      children: circular
        ? []
        : (graph.edges[id] ?? []).map((e) => expand(e.target, e)),
    };
  };
  return expand(graph.root);
};

/** Depth-first, deduplicated by id (first occurrence wins), root excluded. */
export const flatten = (tree: DepTreeNode): FlatDependency[] => {
  const seen = new Set<NodeId>([tree.id]);
  const out: FlatDependency[] = [];
  const walk = (n: DepTreeNode, depth: number): void => {
    for (const c of n.children) {
      if (!seen.has(c.id)) {
        seen.add(c.id);
        out.push({
          id: c.id,
          label: c.label,
          kind: c.kind,
          depth,
          exists: c.exists,
        });
      }
      walk(c, depth + 1);
    }
  };
  walk(tree, 1);
  return out;
};

export const summarize = (graph: DependencyGraph): DependencySummary => {
  const label = (id: NodeId): string => graph.nodes[id]?.label ?? id;
  const all = Object.values(graph.nodes);
  const missing = all.filter((n) => n.kind === 'file' && !n.exists);

  const guardedByName = new Map<string, boolean>();
  for (const list of Object.values(graph.edges))
    for (const e of list) {
      const target = graph.nodes[e.target];
      if (target?.kind !== 'package') continue;
      // A package counts as guarded only if every reference is guarded.
      const prev = guardedByName.get(target.label);
      guardedByName.set(
        target.label,
        (prev ?? true) && e.guarded === true,
      );
    }

  return {
    uniqueCount: all.length - 1,
    hasCircular: graph.cycles.length > 0,
    circularCount: graph.cycles.length,
    circularPaths: graph.cycles.map((c) => c.map(label).join(' -> ')),
    missingCount: missing.length,
    missingPaths: missing.map((n) => n.label),
    packages: [...guardedByName.entries()].map(([name, guarded]) => ({
      name,
      guarded,
    })),
  };
};

const suffix = (n: DepTreeNode): string => {
  if (n.circular) return ' (circular)';
  if (n.kind === 'package') return n.guarded ? ' [package, guarded]' : ' [package]';
  return n.exists ? '' : ' (not found)';
};

/** Render the tree with box-drawing connectors. */
export const formatTree = (tree: DepTreeNode): string => {
  const lines: string[] = [tree.label];
  const walk = (n: DepTreeNode, prefix: string): void => {
    n.children.forEach((c, i) => {
      const last = i === n.children.length - 1;
      lines.push(`${prefix}${last ? '└── ' : '├── '}${c.label}${suffix(c)}`);
      walk(c, `${prefix}${last ? '    ' : '│   '}`);
    });
  };
  walk(tree, '');
  return lines.join('\n');
};
