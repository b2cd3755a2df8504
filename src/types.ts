export interface WorkspacePackage {
  name: string;
  /** Workspace-root-relative path; `.` marks the virtual root package. */
  sourcePath: string;
}

export type PackageRegistry = Readonly<Record<string, WorkspacePackage>>;

export interface ImpactResult {
  directlyChanged: Set<string>;
  testAll: boolean;
}

export interface ImpactReport extends ImpactResult {
  baseRef: string;
  repoRoot: string;
  changedFiles: string[];
  workspaceFiles: string[];
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
}
