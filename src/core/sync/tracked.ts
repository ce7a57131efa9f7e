import { existsSync, readdirSync } from 'node:fs';
import { isAbsolute, join, normalize, relative, sep } from 'node:path';

const IGNORED_NAMES = new Set(['.DS_Store']);

/**
 * Relative POSIX paths of every regular file under the dotfiles root, sorted.
 * Symlinks are not followed.
 */
export function listTrackedFiles(dotfilesDir: string): string[] {
  if (!existsSync(dotfilesDir)) return [];

  const files: string[] = [];
  const walk = (dir: string) => {
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      if (IGNORED_NAMES.has(entry.name)) continue;
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(full);
      } else if (entry.isFile()) {
        files.push(toPosix(relative(dotfilesDir, full)));
      }
    }
  };
  walk(dotfilesDir);

  return files.sort();
}

/**
 * Normalizes a user-supplied relative path. Returns null when the path is
 * absolute or climbs out of the root.
 */
export function normalizeRelativePath(path: string): string | null {
  const trimmed = path.trim();
  if (!trimmed || isAbsolute(trimmed)) return null;

  const normalized = toPosix(normalize(trimmed)).replace(/\/+$/, '');
  if (!normalized || normalized === '.' || normalized === '..' || normalized.startsWith('../')) {
    return null;
  }
  return normalized;
}

function toPosix(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/');
}
