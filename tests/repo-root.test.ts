import { describe, expect, it, vi } from 'vitest';
import { NotARepositoryError } from '../src/errors';
import { locateRepoRoot } from '../src/repo-root';
import type { CommandResult, CommandRunner, RunOptions } from '../src/types';

vi.mock('@actions/core', () => ({
  debug: vi.fn(),
  info: vi.fn()
}));

function createRunner(result: CommandResult) {
  const run = vi.fn(async (_command: string, _args: readonly string[], _options?: RunOptions) => result);
  const runner: CommandRunner = { run };
  return { runner, run };
}

describe('locateRepoRoot', () => {
  it('returns the trimmed top-level directory', async () => {
    const { runner, run } = createRunner({ exitCode: 0, stdout: '/home/dev/monorepo\n', stderr: '' });

    await expect(locateRepoRoot({ cwd: '/home/dev/monorepo/python', runner })).resolves.toBe('/home/dev/monorepo');
    expect(run).toHaveBeenCalledWith('git', ['rev-parse', '--show-toplevel'], {
      cwd: '/home/dev/monorepo/python'
    });
  });

  it('raises NotARepositoryError when git fails', async () => {
    const { runner } = createRunner({
      exitCode: 128,
      stdout: '',
      stderr: 'fatal: not a git repository (or any of the parent directories): .git'
    });

    const attempt = locateRepoRoot({ runner });

    await expect(attempt).rejects.toBeInstanceOf(NotARepositoryError);
    await expect(attempt).rejects.toThrow('Not a git repository. Run difftrace from within a git repo.');
  });
});
