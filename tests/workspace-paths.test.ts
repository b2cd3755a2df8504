import { mkdirSync, mkdtempSync, realpathSync, rmSync, symlinkSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { relativizeToWorkspace } from '../src/workspace-paths';

const changed = ['python/packages/core/src/x.py', 'docs/index.md', 'python', 'python/uv.lock'];

describe('relativizeToWorkspace', () => {
  it('returns the input when the workspace is the repository root', () => {
    expect(relativizeToWorkspace(changed, '/srv/difftrace-repo', '/srv/difftrace-repo/')).toEqual(changed);
  });

  it('strips the workspace prefix and drops files outside it', () => {
    expect(relativizeToWorkspace(changed, '/srv/difftrace-repo', '/srv/difftrace-repo/python')).toEqual([
      'packages/core/src/x.py',
      '.',
      'uv.lock'
    ]);
  });

  it('requires a full path segment match', () => {
    const files = ['python-legacy/setup.py', 'python/app.py'];
    expect(relativizeToWorkspace(files, '/srv/difftrace-repo', '/srv/difftrace-repo/python')).toEqual(['app.py']);
  });

  it('handles nested workspace directories', () => {
    const files = ['tools/py/lib/a.py', 'tools/other.py'];
    expect(relativizeToWorkspace(files, '/srv/difftrace-repo', '/srv/difftrace-repo/tools/py')).toEqual([
      'lib/a.py'
    ]);
  });

  it('returns nothing when the workspace lies outside the repository', () => {
    expect(relativizeToWorkspace(changed, '/srv/difftrace-repo', '/srv/elsewhere')).toEqual([]);
    expect(relativizeToWorkspace(changed, '/srv/difftrace-repo/python', '/srv/difftrace-repo')).toEqual([]);
  });

  it('returns an empty list for no changes', () => {
    expect(relativizeToWorkspace([], '/srv/difftrace-repo', '/srv/difftrace-repo/python')).toEqual([]);
  });

  describe('with symlinked roots', () => {
    let sandbox: string | undefined;

    afterEach(() => {
      if (sandbox) {
        rmSync(sandbox, { recursive: true, force: true });
        sandbox = undefined;
      }
    });

    it('resolves links before comparing roots', () => {
      sandbox = realpathSync(mkdtempSync(join(tmpdir(), 'difftrace-')));
      const repo = join(sandbox, 'repo');
      mkdirSync(join(repo, 'python'), { recursive: true });
      const link = join(sandbox, 'link');
      symlinkSync(repo, link, 'dir');

      expect(relativizeToWorkspace(['python/app.py', 'README.md'], repo, join(link, 'python'))).toEqual([
        'app.py'
      ]);
      expect(relativizeToWorkspace(['README.md'], link, repo)).toEqual(['README.md']);
    });

    it('resolves links above a workspace directory that no longer exists', () => {
      sandbox = realpathSync(mkdtempSync(join(tmpdir(), 'difftrace-')));
      const repo = join(sandbox, 'repo');
      mkdirSync(repo, { recursive: true });
      const link = join(sandbox, 'link');
      symlinkSync(repo, link, 'dir');

      expect(
        relativizeToWorkspace(['python/app.py', 'python', 'README.md'], repo, join(link, 'python'))
      ).toEqual(['app.py', '.']);
    });
  });
});
