/* src/runner/deps/index.ts
 * Dependency analysis entry point.
 */
import { buildDependencyGraph } from './graph';
import { flatten, summarize, toTree } from './tree';
import type {
  DependencyGraph,
  DependencySummary,
  DepTreeNode,
  FlatDependency,
} from './types';

export type DependencyReport = {
  graph: DependencyGraph;
  tree: DepTreeNode;
  flat: FlatDependency[];
  summary: DependencySummary;
};

export const analyzeDependencies = async (
  rootScript: string,
): Promise<DependencyReport> => {
  const graph = await buildDependencyGraph(rootScript);
  const tree = toTree(graph);
  return { graph, tree, flat: flatten(tree), summary: summarize(graph) };
};

export { buildDependencyGraph, packageNodeId } from './graph';
export { scanScript, type ScriptReference } from './parser';
export { flatten, formatTree, summarize, toTree } from './tree';
export type * from './types';
