/* src/runner/deps/parser.ts
 * Scan do-file text for inclusion and package-requirement statements.
 */
import type { IncludeStatement, RequireStatement } from './types';

export type ScriptReference =
  | {
      kind: 'include';
      statement: IncludeStatement;
      /** Path as written, with `.do` added when it has no extension. */
      path: string;
      line: number;
    }
  | {
      kind: 'require';
      statement: RequireStatement;
      name: string;
      guarded: boolean;
      line: number;
    };

const INCLUDE_RE =
  /^(do|run|include)\s+(?:`"([^"]+)"'|"([^"]+)"|'([^']+)'|(\S+))/i;
const SSC_RE = /^ssc\s+inst(?:a|al|all)?\s+([^\s,]+)/i;
const NET_RE = /^net\s+inst(?:a|al|all)?\s+([^\s,]+)/i;
const GITHUB_RE = /^github\s+inst(?:a|al|all)?\s+([^\s,]+)/i;
const REQUIRE_RE = /^require\s+([^\s,]+)/i;

// capture/quietly/noisily prefixes with their abbreviations, optional colon
const PREFIX_RE =
  /^(cap(?:t|tu|tur|ture)?|qui(?:e|et|etl|etly)?|noi(?:s|si|sil|sily)?)\b\s*:?\s*/i;

const withDoExtension = (p: string): string =>
  /\.[^./\\]+$/.test(p) ? p : `${p}.do`;

const includeStatement = (word: string): IncludeStatement => {
  const w = word.toLowerCase();
  return w === 'do' ? 'do' : w === 'run' ? 'run' : 'include';
};

const stripPrefixes = (s: string): { rest: string; guarded: boolean } => {
  let rest = s;
  let guarded = false;
  for (;;) {
    const m = PREFIX_RE.exec(rest);
    if (!m?.[1]) return { rest, guarded };
    if (m[1].toLowerCase().startsWith('cap')) guarded = true;
    rest = rest.slice(m[0].length);
  }
};

/** Remove block comments, tracking state across lines. */
const stripBlockComments = (
  line: string,
  open: boolean,
): { text: string; open: boolean } => {
  let text = '';
  let i = 0;
  let inside = open;
  while (i < line.length) {
    if (inside) {
      const end = line.indexOf('*/', i);
      if (end < 0) return { text, open: true };
      i = end + 2;
      inside = false;
    } else {
      const start = line.indexOf('/*', i);
      if (start < 0) {
        text += line.slice(i);
        break;
      }
      text += line.slice(i, start);
      i = start + 2;
      inside = true;
    }
  }
  return { text, open: inside };
};

const requirement = (
  trimmed: string,
): { statement: RequireStatement; name: string } | undefined => {
  const pick = (
    re: RegExp,
    statement: RequireStatement,
  ): { statement: RequireStatement; name: string } | undefined => {
    const m = re.exec(trimmed);
    if (!m?.[1]) return undefined;
    const raw = m[1];
    const name = raw.slice(raw.lastIndexOf('/') + 1).toLowerCase();
    return name ? { statement, name } : undefined;
  };
  return (
    pick(SSC_RE, 'ssc') ??
    pick(NET_RE, 'net') ??
    pick(GITHUB_RE, 'github') ??
    pick(REQUIRE_RE, 'require')
  );
};

/** All references in a script, in line order. */
export const scanScript = (text: string): ScriptReference[] => {
  const out: ScriptReference[] = [];
  let inBlock = false;
  const lines = text.split(/\r?\n/);
  lines.forEach((raw, idx) => {
    const line = idx + 1;
    const stripped = stripBlockComments(raw, inBlock);
    inBlock = stripped.open;
    let s = stripped.text.trim();
    if (!s || s.startsWith('*') || s.startsWith('//')) return;
    const lineComment = s.search(/\s\/\/(?:\s|$)/);
    if (lineComment >= 0) s = s.slice(0, lineComment).trim();

    const { rest, guarded } = stripPrefixes(s);

    const inc = INCLUDE_RE.exec(rest);
    if (inc?.[1]) {
      const target = inc[2] ?? inc[3] ?? inc[4] ?? inc[5]?.replace(/,$/, '');
      if (target) {
        out.push({
          kind: 'include',
          statement: includeStatement(inc[1]),
          path: withDoExtension(target),
          line,
        });
      }
      return;
    }

    const req = requirement(rest);
    if (req) out.push({ kind: 'require', ...req, guarded, line });
  });
  return out;
};
