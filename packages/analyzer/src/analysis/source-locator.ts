import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { ResolvedSource } from '../model';

/** Code compiled into the runtime itself (`node:internal/*`). */
export const RUNTIME_INTERNAL_LABEL = '@internal';
/** Code the profiler sees without a readable source file (wasm, V8 natives). */
export const NATIVE_LABEL = '@native';
/** The runtime's public built-in modules (`node:fs`, `node:events`, ...). */
export const RUNTIME_LABEL = '@node';
/** Files that belong to no package. */
export const SCRIPT_LABEL = '@script';
/** The package hosting the sampler; its frames close every captured stack. */
export const SELF_PACKAGE_LABEL = '@allocview/analyzer';
/** Scope shared by the viewer's own packages, the sampler and the command line. */
export const INSTRUMENTATION_SCOPE = '@allocview/';

export const HIDDEN_LABELS: readonly string[] = ['', RUNTIME_INTERNAL_LABEL, NATIVE_LABEL];
/** Labels of code that belongs to the runtime rather than to a package. */
export const RUNTIME_LABELS: readonly string[] = [...HIDDEN_LABELS, RUNTIME_LABEL];

export type SourceResolver = (file: string) => ResolvedSource;

const UNRESOLVED: ResolvedSource = { fullPath: '', packageLabel: '', relativePath: '' };

export const toPackageLabel = (packageName: string): string =>
  packageName.startsWith('@') ? packageName : `@${packageName}`;

const toFilesystemPath = (file: string): string | undefined => {
  if (file.startsWith('file://')) {
    return fileURLToPath(file);
  }
  return path.isAbsolute(file) ? file : undefined;
};

const readPackageName = (directory: string): string | undefined => {
  const manifestPath = path.join(directory, 'package.json');
  if (!fs.existsSync(manifestPath)) {
    return undefined;
  }

  try {
    const manifest: unknown = JSON.parse(fs.readFileSync(manifestPath, 'utf8'));
    if (typeof manifest === 'object' && manifest !== null && 'name' in manifest && typeof manifest.name === 'string') {
      return manifest.name;
    }
  } catch (error) {
    console.warn(`Ignoring unreadable ${manifestPath}: ${(error as Error).message}`);
  }
  return undefined;
};

const resolveFromNodeModules = (fullPath: string): ResolvedSource | undefined => {
  const segments = fullPath.split(/[\\/]/);
  const index = segments.lastIndexOf('node_modules');
  if (index === -1 || index + 1 >= segments.length) {
    return undefined;
  }

  const scoped = segments[index + 1].startsWith('@');
  const nameLength = scoped ? 2 : 1;
  const packageName = segments.slice(index + 1, index + 1 + nameLength).join('/');
  return {
    fullPath,
    packageLabel: toPackageLabel(packageName),
    relativePath: segments.slice(index + 1 + nameLength).join('/'),
  };
};

const resolveFromManifest = (fullPath: string): ResolvedSource => {
  let directory = path.dirname(fullPath);

  for (;;) {
    const packageName = readPackageName(directory);
    if (packageName) {
      return {
        fullPath,
        packageLabel: toPackageLabel(packageName),
        relativePath: path.relative(directory, fullPath).replace(/\\/g, '/'),
      };
    }

    const parent = path.dirname(directory);
    if (parent === directory) {
      break;
    }
    directory = parent;
  }

  return { fullPath, packageLabel: SCRIPT_LABEL, relativePath: path.basename(fullPath) };
};

/**
 * Maps a V8 script URL onto the file it came from and the package owning it.
 */
export const resolveNodeSource: SourceResolver = (file) => {
  if (file.length === 0) {
    return UNRESOLVED;
  }

  if (file.startsWith('node:internal/')) {
    return { fullPath: '', packageLabel: RUNTIME_INTERNAL_LABEL, relativePath: file.slice('node:internal/'.length) };
  }

  if (file.startsWith('node:')) {
    return { fullPath: '', packageLabel: RUNTIME_LABEL, relativePath: file.slice('node:'.length) };
  }

  if (file.startsWith('wasm://') || file.startsWith('native ')) {
    return { fullPath: '', packageLabel: NATIVE_LABEL, relativePath: file };
  }

  const fullPath = toFilesystemPath(file);
  if (!fullPath) {
    return UNRESOLVED;
  }

  return resolveFromNodeModules(fullPath) ?? resolveFromManifest(fullPath);
};

/**
 * Memoizing front for a {@link SourceResolver}. One instance is shared by the
 * filters, the aggregator and the renderer of a session.
 */
export class SourceLocator {
  private readonly cache = new Map<string, ResolvedSource>();

  constructor(private readonly resolver: SourceResolver = resolveNodeSource) {}

  resolve(file: string): ResolvedSource {
    const cached = this.cache.get(file);
    if (cached) {
      return cached;
    }
    const resolved = this.resolver(file);
    this.cache.set(file, resolved);
    return resolved;
  }

  fullPath(file: string): string {
    return this.resolve(file).fullPath;
  }

  packageLabel(file: string): string {
    return this.resolve(file).packageLabel;
  }

  /** The path shown after the package label; unresolved files show in full. */
  displayPath(file: string): string {
    const { packageLabel, relativePath, fullPath } = this.resolve(file);
    if (packageLabel === '') {
      return fullPath || file || '(unknown)';
    }
    return `/${relativePath}`;
  }

  get size(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
  }
}
