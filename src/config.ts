import { readFile } from 'node:fs/promises';
import { InvalidConfigError } from './errors';
import type { PackageRegistry, WorkspacePackage } from './types';

type UnknownRecord = Record<string, unknown>;

const DISABLED_TRIGGERS = 'none';

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Blank input keeps the defaults (`undefined`); the single value `none` yields
 * an empty set, which turns the trigger category off.
 */
export function parseTriggerList(lines: readonly string[]): ReadonlySet<string> | undefined {
  const entries = lines.map((line) => line.trim()).filter((line) => line.length > 0);

  if (entries.length === 0) {
    return undefined;
  }
  if (entries.length === 1 && entries[0] === DISABLED_TRIGGERS) {
    return new Set();
  }
  return new Set(entries);
}

function normalizeSourcePath(path: string): string {
  const trimmed = path.trim().replace(/\/+$/, '');
  return trimmed.length > 0 ? trimmed : '.';
}

function readSourcePath(name: string, descriptor: unknown): string {
  if (typeof descriptor === 'string') {
    return descriptor;
  }
  if (isRecord(descriptor)) {
    const sourcePath = descriptor.sourcePath ?? descriptor.source_path;
    if (typeof sourcePath === 'string') {
      return sourcePath;
    }
  }
  throw new InvalidConfigError(
    `Package "${name}" must map to a source path string or an object with a \`sourcePath\` string.`
  );
}

export function parsePackageRegistry(data: unknown): PackageRegistry {
  if (!isRecord(data)) {
    throw new InvalidConfigError('Package registry must be a JSON object keyed by package name.');
  }

  const registry: Record<string, WorkspacePackage> = {};
  for (const [name, descriptor] of Object.entries(data)) {
    registry[name] = { name, sourcePath: normalizeSourcePath(readSourcePath(name, descriptor)) };
  }
  return registry;
}

function parseJson(raw: string, origin: string): unknown {
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidConfigError(`Could not parse ${origin} as JSON: ${reason}`);
  }
}

export interface LoadPackageRegistryOptions {
  inline?: string;
  file?: string;
}

export async function loadPackageRegistry(options: LoadPackageRegistryOptions): Promise<PackageRegistry> {
  const inline = options.inline?.trim() ?? '';
  const file = options.file?.trim() ?? '';

  if (inline && file) {
    throw new InvalidConfigError('Provide only one of `packages` or `packages-file`.');
  }
  if (inline) {
    return parsePackageRegistry(parseJson(inline, '`packages`'));
  }
  if (file) {
    const content = await readFile(file, 'utf8');
    return parsePackageRegistry(parseJson(content, file));
  }
  throw new InvalidConfigError('Either `packages` or `packages-file` must be provided.');
}
