/* src/runner/packages/pkg-file.ts
 * Parse Stata .pkg manifests.
 */

export type PkgInfo = {
  title: string;
  author?: string;
  distributionDate?: string;
  /** Relative file paths as listed (f/F lines, h lines with .sthlp added). */
  files: string[];
  description: string[];
};

/** `'NAME': the title` -> `the title`. */
const titleOf = (rest: string): string => {
  const m = /^'[^']*'\s*:\s*(.*)$/.exec(rest);
  return m?.[1]?.trim() ?? rest;
};

export const parsePkgFile = (text: string, name: string): PkgInfo => {
  let title = '';
  let author: string | undefined;
  let distributionDate: string | undefined;
  const files: string[] = [];
  const description: string[] = [];

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line) continue;
    const kind = line.charAt(0);
    const rest = line.slice(1).trim();
    switch (kind) {
      case 'd':
      case 'D': {
        if (rest.startsWith('Distribution-Date:')) {
          distributionDate = rest.slice('Distribution-Date:'.length).trim();
        } else if (/^Authors?:/.test(rest)) {
          author = rest.replace(/^Authors?:/, '').trim();
        } else if (rest) {
          if (!title) title = titleOf(rest);
          description.push(rest);
        }
        break;
      }
      case 'f':
      case 'F': {
        if (rest) files.push(rest);
        break;
      }
      case 'h':
      case 'H': {
        if (rest) files.push(rest.includes('.') ? rest : `${rest}.sthlp`);
        break;
      }
      default:
        break;
    }
  }

  return {
    title: title || name,
    ...(author ? { author } : {}),
    ...(distributionDate ? { distributionDate } : {}),
    files,
    description,
  };
};

/** Basename of a listed file (stored flat in the cache slot). */
export const storedName = (listed: string): string =>
  listed.slice(Math.max(listed.lastIndexOf('/'), listed.lastIndexOf('\\')) + 1);
