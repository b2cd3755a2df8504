import type { ImpactResult, PackageRegistry, WorkspacePackage } from './types';

/** Files at the workspace root whose change means every package is tested. */
export const DEFAULT_ROOT_TRIGGERS: ReadonlySet<string> = new Set(['pyproject.toml', 'uv.lock']);
export const DEFAULT_DIR_TRIGGERS: ReadonlySet<string> = new Set(['.github/']);

const ROOT_SOURCE_PATH = '.';

export interface MapFilesOptions {
  /** Exact workspace-relative paths. Omit for the defaults; an empty set disables. */
  rootTriggers?: ReadonlySet<string>;
  /** Plain path prefixes. Omit for the defaults; an empty set disables. */
  dirTriggers?: ReadonlySet<string>;
}

function startsWithAny(path: string, prefixes: ReadonlySet<string>): boolean {
  for (const prefix of prefixes) {
    if (path.startsWith(prefix)) {
      return true;
    }
  }
  return false;
}

/**
 * Attributes workspace-relative changed files to the packages that own them.
 * A trigger file sets `testAll` and is never attributed. Otherwise the package
 * with the longest matching source path wins.
 */
export function mapFilesToPackages(
  changedFiles: readonly string[],
  packages: PackageRegistry,
  options: MapFilesOptions = {}
): ImpactResult {
  const { rootTriggers = DEFAULT_ROOT_TRIGGERS, dirTriggers = DEFAULT_DIR_TRIGGERS } = options;

  const candidates: WorkspacePackage[] = Object.values(packages)
    .filter((pkg) => pkg.sourcePath !== ROOT_SOURCE_PATH)
    .sort((a, b) => b.sourcePath.length - a.sourcePath.length);

  const directlyChanged = new Set<string>();
  let testAll = false;

  for (const file of changedFiles) {
    if (rootTriggers.has(file) || startsWithAny(file, dirTriggers)) {
      testAll = true;
      continue;
    }

    const owner = candidates.find((pkg) => file.startsWith(`${pkg.sourcePath}/`));
    if (owner) {
      directlyChanged.add(owner.name);
    }
  }

  return { directlyChanged, testAll };
}
