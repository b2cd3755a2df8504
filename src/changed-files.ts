import * as core from '@actions/core';
import { execCommandRunner } from './command-runner';
import { DiffFailedError, UnresolvableRefError } from './errors';
import type { CommandRunner } from './types';

const UNRESOLVABLE_REF_MARKERS = ['unknown revision', 'not a git repository'] as const;

export interface ListChangedFilesOptions {
  baseRef: string;
  repoRoot?: string;
  runner?: CommandRunner;
}

/**
 * Lists files changed on HEAD since it diverged from `baseRef`, relative to the
 * repository root. Uses the three-dot range, so the comparison point is the
 * merge-base rather than the tip of `baseRef`.
 */
export async function listChangedFiles(options: ListChangedFilesOptions): Promise<string[]> {
  const { baseRef, repoRoot, runner = execCommandRunner } = options;

  const args = ['diff', '--name-only', `${baseRef}...HEAD`];
  const result = await runner.run('git', args, { cwd: repoRoot });

  if (result.exitCode !== 0) {
    const stderr = result.stderr.trim();
    core.debug(`git ${args.join(' ')} exited with ${result.exitCode}: ${stderr}`);
    if (UNRESOLVABLE_REF_MARKERS.some((marker) => stderr.includes(marker))) {
      throw new UnresolvableRefError(baseRef);
    }
    throw new DiffFailedError(stderr);
  }

  return result.stdout
    .trim()
    .split(/\r?\n/)
    .filter((line) => line.length > 0);
}
