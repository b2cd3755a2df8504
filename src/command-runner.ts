import { getExecOutput } from '@actions/exec';
import type { CommandResult, CommandRunner, RunOptions } from './types';

/**
 * Runs commands through `@actions/exec`. A non-zero exit status is reported in
 * the result rather than thrown, so callers can classify the failure.
 */
export const execCommandRunner: CommandRunner = {
  async run(command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    const { exitCode, stdout, stderr } = await getExecOutput(command, [...args], {
      cwd: options.cwd,
      silent: true,
      ignoreReturnCode: true
    });
    return { exitCode, stdout, stderr };
  }
};
