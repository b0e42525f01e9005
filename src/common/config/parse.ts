// src/common/config/parse.ts
import YAML from 'yaml';

/**
 * Parse configuration text based on file extension.
 * - JSON when path ends with ".json"
 * - YAML otherwise
 */
export const parseText = (p: string, text: string): unknown =>
  p.endsWith('.json') ? (JSON.parse(text) as unknown) : (YAML.parse(text) as unknown);

/**
 * Apply an edit to configuration text and return the new text.
 * YAML goes through a Document so comments and key order survive; JSON is
 * re-serialized with two-space indentation.
 */
export const editText = (
  p: string,
  text: string,
  edit: (doc: ConfigDocument) => void,
): string => {
  if (p.endsWith('.json')) {
    const root: unknown = text.trim() ? JSON.parse(text) : {};
    const doc = jsonDocument(isRecord(root) ? root : {});
    edit(doc);
    return `${JSON.stringify(doc.value, null, 2)}\n`;
  }
  const yamlDoc = YAML.parseDocument(text);
  edit({
    setIn: (path, value) => {
      yamlDoc.setIn(path, yamlDoc.createNode(value));
    },
    // deleteIn throws on a missing intermediate collection
    deleteIn: (path) => yamlDoc.hasIn(path) && yamlDoc.deleteIn(path),
  });
  return yamlDoc.toString();
};

/** The small editing surface shared by YAML and JSON documents. */
export type ConfigDocument = {
  setIn: (path: readonly string[], value: unknown) => void;
  /** True when something was removed. */
  deleteIn: (path: readonly string[]) => boolean;
};

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === 'object' && v !== null && !Array.isArray(v);

const jsonDocument = (
  value: Record<string, unknown>,
): ConfigDocument & { value: Record<string, unknown> } => ({
  value,
  setIn: (path, v) => {
    let node = value;
    path.slice(0, -1).forEach((k) => {
      const next = node[k];
      if (isRecord(next)) node = next;
      else {
        const created: Record<string, unknown> = {};
        node[k] = created;
        node = created;
      }
    });
    const last = path[path.length - 1];
    if (last !== undefined) node[last] = v;
  },
  deleteIn: (path) => {
    let node: unknown = value;
    for (const k of path.slice(0, -1)) node = isRecord(node) ? node[k] : undefined;
    const last = path[path.length - 1];
    if (!isRecord(node) || last === undefined || !(last in node)) return false;
    return delete node[last];
  },
});
