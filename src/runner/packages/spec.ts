/* src/runner/packages/spec.ts
 * Manifest package specs <-> PackageRef.
 */
import type { DependencyGroup, PackageRef, PackageSource } from './types';

/** Manifest value: a source string, or `{ source, version }`. */
export type PackageSpec = string | { source: string; version?: string };

const GITHUB_RE = /^github:([\w.-]+\/[\w.-]+)(?:@(\S+))?$/;

/** Parse a source string; throws with the offending text. */
export const parseSource = (raw: string): PackageSource => {
  const s = raw.trim();
  if (s === 'ssc') return { type: 'ssc' };
  const gh = GITHUB_RE.exec(s);
  if (gh?.[1]) {
    return gh[2]
      ? { type: 'github', repo: gh[1], ref: gh[2] }
      : { type: 'github', repo: gh[1] };
  }
  if (s.startsWith('net:') && s.length > 4)
    return { type: 'net', url: s.slice(4) };
  if (s.startsWith('local:') && s.length > 6)
    return { type: 'local', path: s.slice(6) };
  throw new Error(
    `unknown package source "${raw}" (expected ssc, github:user/repo[@ref], net:<url> or local:<path>)`,
  );
};

export const toPackageRef = (
  name: string,
  spec: PackageSpec,
  group: DependencyGroup,
): PackageRef => {
  const lower = name.toLowerCase();
  if (typeof spec === 'string')
    return { name: lower, source: parseSource(spec), group };
  const constraint = spec.version?.trim();
  return {
    name: lower,
    source: parseSource(spec.source),
    ...(constraint ? { constraint } : {}),
    group,
  };
};

/** Manifest form of a source (inverse of parseSource; drops lock-only fields). */
export const sourceSpec = (s: PackageSource): string => {
  switch (s.type) {
    case 'ssc':
      return 'ssc';
    case 'github':
      return `github:${s.repo}${s.ref ? `@${s.ref}` : ''}`;
    case 'net':
      return `net:${s.url}`;
    case 'local':
      return `local:${s.path}`;
  }
};

export const toPackageSpec = (source: string, version?: string): PackageSpec =>
  version ? { source, version } : source;

/**
 * Whether a locked source still answers a declaration. A declared github
 * source without a ref accepts whatever tip was locked.
 */
export const sourceMatches = (
  declared: PackageSource,
  locked: PackageSource,
): boolean => {
  switch (declared.type) {
    case 'ssc':
      return locked.type === 'ssc';
    case 'github':
      return (
        locked.type === 'github' &&
        locked.repo.toLowerCase() === declared.repo.toLowerCase() &&
        (declared.ref === undefined || declared.ref === locked.ref)
      );
    case 'net':
      return locked.type === 'net' && locked.url === declared.url;
    case 'local':
      return locked.type === 'local' && locked.path === declared.path;
  }
};

/** The three dependency sections of the manifest. */
export type ManifestPackages = {
  dependencies?: Record<string, PackageSpec>;
  dev?: Record<string, PackageSpec>;
  test?: Record<string, PackageSpec>;
};

export const GROUP_SECTION = {
  production: 'dependencies',
  dev: 'dev',
  test: 'test',
} as const satisfies Record<DependencyGroup, keyof ManifestPackages>;

/**
 * Every declared package as a PackageRef, sorted by name. A name declared in
 * more than one section keeps its first group (production, dev, test).
 */
export const declaredRefs = (
  packages: ManifestPackages | undefined,
): PackageRef[] => {
  const out = new Map<string, PackageRef>();
  for (const group of ['production', 'dev', 'test'] as const) {
    for (const [name, spec] of Object.entries(
      packages?.[GROUP_SECTION[group]] ?? {},
    )) {
      const ref = toPackageRef(name, spec, group);
      if (!out.has(ref.name)) out.set(ref.name, ref);
    }
  }
  return [...out.values()].sort((a, b) => a.name.localeCompare(b.name));
};
