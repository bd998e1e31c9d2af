import path from 'node:path';
import { Minimatch } from 'minimatch';
import type { ExplorerConfig } from './config';

// Patterns are plain globs: a leading `!` or `#` is part of the pattern.
// Separators are matched as ordinary characters, so `*` and `?` cross them.
const SEPARATOR = '\u0000';

const MATCH_OPTIONS = {
  dot: true,
  nocase: false,
  matchBase: false,
  nonegate: true,
  nocomment: true,
};

export interface EntryFilter {
  shouldSkip(entryPath: string): boolean;
}

/**
 * Decides which entries under the root take part in browsing and export.
 * Both checks work on the path relative to the root, so whatever sits above
 * the root never excludes anything.
 */
export class PathFilter implements EntryFilter {
  readonly rootPath: string;
  private patterns: Minimatch[];
  private includeHidden: boolean;

  constructor(config: Pick<ExplorerConfig, 'rootPath' | 'excludes' | 'includeHidden'>) {
    this.rootPath = path.resolve(config.rootPath);
    this.patterns = config.excludes.map(
      (pattern) => new Minimatch(pattern.split('/').join(SEPARATOR), MATCH_OPTIONS)
    );
    this.includeHidden = config.includeHidden;
  }

  private relativeSegments(entryPath: string): string[] {
    const relative = path.relative(this.rootPath, path.resolve(entryPath));
    return relative.split(path.sep).filter((segment) => segment !== '' && segment !== '.');
  }

  private matchesAny(candidate: string): boolean {
    const flattened = candidate.split('/').join(SEPARATOR);
    return this.patterns.some((pattern) => pattern.match(flattened));
  }

  /**
   * Tests every prefix of the relative path, by its last segment and by the
   * slash-joined subpath, so an excluded directory hides its whole subtree.
   */
  isExcludedByPattern(entryPath: string): boolean {
    const segments = this.relativeSegments(entryPath);

    for (let depth = 1; depth <= segments.length; depth++) {
      const name = segments[depth - 1];
      const subpath = segments.slice(0, depth).join('/');
      if (this.matchesAny(name) || this.matchesAny(subpath)) return true;
    }
    return false;
  }

  isHidden(entryPath: string): boolean {
    return this.relativeSegments(entryPath).some(
      (segment) => segment !== '..' && segment.startsWith('.')
    );
  }

  shouldSkip(entryPath: string): boolean {
    if (!this.includeHidden && this.isHidden(entryPath)) return true;
    return path.resolve(entryPath) !== this.rootPath && this.isExcludedByPattern(entryPath);
  }
}
