import * as core from '@actions/core';
import { listChangedFiles } from './changed-files';
import { execCommandRunner } from './command-runner';
import { mapFilesToPackages } from './impact';
import { locateRepoRoot } from './repo-root';
import type { CommandRunner, ImpactReport, PackageRegistry } from './types';
import { relativizeToWorkspace } from './workspace-paths';

export interface DetectImpactOptions {
  baseRef: string;
  workspaceRoot: string;
  packages: PackageRegistry;
  cwd?: string;
  rootTriggers?: ReadonlySet<string>;
  dirTriggers?: ReadonlySet<string>;
  runner?: CommandRunner;
}

export async function detectImpact(options: DetectImpactOptions): Promise<ImpactReport> {
  const { baseRef, workspaceRoot, packages, cwd, rootTriggers, dirTriggers, runner = execCommandRunner } = options;

  const repoRoot = await locateRepoRoot({ cwd, runner });
  core.info(`Repository root: ${repoRoot}`);

  const changedFiles = await listChangedFiles({ baseRef, repoRoot, runner });
  core.info(`Found ${changedFiles.length} changed file(s) in ${baseRef}...HEAD.`);

  const workspaceFiles = relativizeToWorkspace(changedFiles, repoRoot, workspaceRoot);
  if (workspaceFiles.length < changedFiles.length) {
    core.info(`Ignoring ${changedFiles.length - workspaceFiles.length} file(s) outside ${workspaceRoot}.`);
  }

  const { directlyChanged, testAll } = mapFilesToPackages(workspaceFiles, packages, {
    rootTriggers,
    dirTriggers
  });

  return {
    baseRef,
    repoRoot,
    changedFiles,
    workspaceFiles,
    directlyChanged,
    testAll
  };
}
