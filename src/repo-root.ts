import * as core from '@actions/core';
import { execCommandRunner } from './command-runner';
import { NotARepositoryError } from './errors';
import type { CommandRunner } from './types';

export interface LocateRepoRootOptions {
  cwd?: string;
  runner?: CommandRunner;
}

export async function locateRepoRoot(options: LocateRepoRootOptions = {}): Promise<string> {
  const { cwd, runner = execCommandRunner } = options;

  const result = await runner.run('git', ['rev-parse', '--show-toplevel'], { cwd });
  if (result.exitCode !== 0) {
    core.debug(`git rev-parse exited with ${result.exitCode}: ${result.stderr.trim()}`);
    throw new NotARepositoryError();
  }

  return result.stdout.trim();
}
