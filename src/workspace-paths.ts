import { existsSync, realpathSync } from 'node:fs';
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';

/**
 * Resolves symlinks in the deepest existing ancestor of `path` and appends the
 * missing tail, so a deleted workspace directory still canonicalizes.
 */
function canonicalize(path: string): string {
  const absolute = resolve(path);
  const missing: string[] = [];
  let existing = absolute;
  while (!existsSync(existing)) {
    const parent = dirname(existing);
    if (parent === existing) {
      return absolute;
    }
    missing.unshift(basename(existing));
    existing = parent;
  }

  try {
    return join(realpathSync(existing), ...missing);
  } catch {
    return absolute;
  }
}

function isOutside(relativePath: string): boolean {
  return relativePath === '..' || relativePath.startsWith('../') || isAbsolute(relativePath);
}

/**
 * Converts repository-root-relative paths into workspace-root-relative ones.
 * Files outside the workspace are dropped; a change to the workspace directory
 * itself is reported as `.`.
 */
export function relativizeToWorkspace(
  changedFiles: readonly string[],
  repoRoot: string,
  workspaceRoot: string
): string[] {
  const canonicalRepo = canonicalize(repoRoot);
  const canonicalWorkspace = canonicalize(workspaceRoot);

  if (canonicalWorkspace === canonicalRepo) {
    return [...changedFiles];
  }

  const prefix = relative(canonicalRepo, canonicalWorkspace).split(sep).join('/');
  if (isOutside(prefix)) {
    return [];
  }

  const prefixWithSlash = `${prefix}/`;
  const result: string[] = [];
  for (const file of changedFiles) {
    if (file.startsWith(prefixWithSlash)) {
      result.push(file.slice(prefixWithSlash.length));
    } else if (file === prefix) {
      result.push('.');
    }
  }
  return result;
}
