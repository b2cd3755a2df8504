import * as core from '@actions/core';
import * as github from '@actions/github';
import { resolve } from 'node:path';
import { loadPackageRegistry, parseTriggerList } from './config';
import { detectImpact } from './detect';
import { InvalidConfigError } from './errors';
import type { ImpactReport } from './types';

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null;
}

function getNestedString(source: unknown, path: readonly string[]): string | null {
  let current: unknown = source;
  for (const segment of path) {
    if (!isRecord(current)) {
      return null;
    }
    current = current[segment];
  }
  return typeof current === 'string' ? current : null;
}

export async function run(): Promise<void> {
  core.info('Starting difftrace impact analysis.');

  const baseRefInput = core.getInput('base-ref');
  const workspaceRootInput = core.getInput('workspace-root') || '.';
  const packagesInput = core.getInput('packages');
  const packagesFileInput = core.getInput('packages-file');
  const rootTriggers = parseTriggerList(core.getMultilineInput('root-triggers'));
  const dirTriggers = parseTriggerList(core.getMultilineInput('dir-triggers'));

  const context = github.context;

  const baseRef = resolveBaseRef(baseRefInput, context);
  if (!baseRef) {
    throw new InvalidConfigError('`base-ref` must be provided or derivable from the event context.');
  }

  const workspaceRoot = resolve(workspaceRootInput);
  const packages = await loadPackageRegistry({ inline: packagesInput, file: packagesFileInput });

  core.startGroup('Resolved Inputs');
  core.info(`Base ref: ${baseRef}`);
  core.info(`Workspace root: ${workspaceRoot}`);
  core.info(`Packages: ${summarizeList(Object.keys(packages).sort())}`);
  core.info(`Root triggers: ${rootTriggers ? summarizeList([...rootTriggers]) : 'defaults'}`);
  core.info(`Directory triggers: ${dirTriggers ? summarizeList([...dirTriggers]) : 'defaults'}`);
  core.info(`GitHub event: ${context.eventName}`);
  core.endGroup();

  const report = await detectImpact({
    baseRef,
    workspaceRoot,
    packages,
    cwd: workspaceRoot,
    rootTriggers,
    dirTriggers
  });

  const affected = [...report.directlyChanged].sort();

  core.startGroup('Impact');
  core.info(`Workspace files: ${summarizeList(report.workspaceFiles)}`);
  core.info(`Directly changed packages (${affected.length}): ${summarizeList(affected)}`);
  core.info(`Test all: ${report.testAll ? 'yes' : 'no'}`);
  core.endGroup();

  core.setOutput('packages', JSON.stringify(affected));
  core.setOutput('test-all', report.testAll ? 'true' : 'false');
  core.setOutput('changed-files', JSON.stringify(report.workspaceFiles));

  await writeSummary(report, affected);

  core.info('Impact analysis complete. Summary written to job summary.');
}

function resolveBaseRef(baseRefInput: string, context: typeof github.context): string | null {
  if (baseRefInput) {
    return baseRefInput;
  }

  const payload: unknown = context.payload;

  if (context.eventName === 'pull_request' || context.eventName === 'pull_request_target') {
    return getNestedString(payload, ['pull_request', 'base', 'sha']);
  }

  if (context.eventName === 'merge_group') {
    return getNestedString(payload, ['merge_group', 'base_sha']);
  }

  if (context.eventName === 'push') {
    return getNestedString(payload, ['before']);
  }

  return null;
}

function summarizeList(items: string[], max = 10): string {
  if (!items.length) {
    return 'none';
  }
  const visible = items.slice(0, max);
  const remainder = items.length - visible.length;
  return remainder > 0 ? `${visible.join(', ')}, …(+${remainder} more)` : visible.join(', ');
}

async function writeSummary(report: ImpactReport, affected: string[]): Promise<void> {
  core.summary.addHeading('Affected Packages', 2);
  core.summary.addRaw(`Changed files in workspace: **${report.workspaceFiles.length}**\n`);
  core.summary.addRaw(`Test all packages: **${report.testAll ? 'Yes' : 'No'}**\n\n`);

  if (affected.length) {
    core.summary.addList(affected);
  } else {
    core.summary.addRaw('No package was directly changed.\n');
  }

  await core.summary.write();
}
