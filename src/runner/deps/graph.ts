/* src/runner/deps/graph.ts
 * Depth-first dependency expansion from a root do-file.
 * "onPath" flags cycles; "resolved" memoizes diamonds as shared dependencies.
 */
import { existsSync, statSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { FileError } from '@/common/errors';

import { scanScript } from './parser';
import type { DepEdge, DependencyGraph, DepNode, NodeId } from './types';

const isFile = (abs: string): boolean => {
  if (!existsSync(abs)) return false;
  return statSync(abs).isFile();
};

/** Label relative to the root's directory, always with forward slashes. */
const labelFor = (baseDir: string, abs: string): string =>
  path.relative(baseDir, abs).split(path.sep).join('/') || path.basename(abs);

export const packageNodeId = (name: string): NodeId => `pkg:${name}`;

/**
 * Build the graph for a root script. A missing root is a FileError; missing
 * transitive files become leaves with exists=false.
 */
export const buildDependencyGraph = async (
  rootScript: string,
): Promise<DependencyGraph> => {
  const root = path.resolve(rootScript);
  if (!isFile(root))
    throw new FileError(`script not found: ${rootScript}`, root);
  const baseDir = path.dirname(root);

  const nodes: Record<NodeId, DepNode> = {
    [root]: { id: root, kind: 'file', label: labelFor(baseDir, root), exists: true },
  };
  const edges: Record<NodeId, DepEdge[]> = {};
  const cycles: NodeId[][] = [];
  const onPath = new Set<NodeId>();
  const resolved = new Set<NodeId>();
  const stack: NodeId[] = [];

  const visit = async (id: NodeId): Promise<void> => {
    onPath.add(id);
    stack.push(id);
    const refs = scanScript(await readFile(id, 'utf8'));
    const out: DepEdge[] = [];

    for (const ref of refs) {
      if (ref.kind === 'require') {
        const pid = packageNodeId(ref.name);
        nodes[pid] ??= {
          id: pid,
          kind: 'package',
          label: ref.name,
          exists: true,
        };
        out.push({
          target: pid,
          statement: ref.statement,
          line: ref.line,
          ...(ref.guarded ? { guarded: true as const } : {}),
        });
        continue;
      }

      const target = path.resolve(path.dirname(id), ref.path);
      const node = (nodes[target] ??= {
        id: target,
        kind: 'file',
        label: labelFor(baseDir, target),
        exists: isFile(target),
      });
      const edge: DepEdge = {
        target,
        statement: ref.statement,
        line: ref.line,
      };
      if (onPath.has(target)) {
        edge.circular = true;
        cycles.push([...stack.slice(stack.indexOf(target)), target]);
      } else if (node.exists && !resolved.has(target)) {
        await visit(target);
      }
      out.push(edge);
    }

    edges[id] = out;
    stack.pop();
    onPath.delete(id);
    resolved.add(id);
  };

  await visit(root);
  return { root, nodes, edges, cycles };
};
