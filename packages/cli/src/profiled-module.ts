import path from 'path';
import { ProfiledCode } from '@allocview/analyzer';

const NO_ARGUMENTS: readonly unknown[] = [];

const hasCode = (error: unknown, code: string): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === code;

/** The named function export of a loaded module, callable without arguments. */
export const pickExport = (loaded: unknown, exportName: string): ProfiledCode | undefined => {
  if ((typeof loaded !== 'object' && typeof loaded !== 'function') || loaded === null || !(exportName in loaded)) {
    return undefined;
  }
  const candidate: unknown = Reflect.get(loaded, exportName);
  return typeof candidate === 'function' ? () => Reflect.apply(candidate, undefined, NO_ARGUMENTS) : undefined;
};

/**
 * Loads the module to profile. Modules are loaded through `require`, so ES
 * modules are rejected with a message saying so.
 */
export const loadProfiledCode = async (modulePath: string, exportName = 'default'): Promise<ProfiledCode> => {
  const resolved = path.resolve(modulePath);
  let loaded: unknown;
  try {
    loaded = await import(resolved);
  } catch (error) {
    if (hasCode(error, 'ERR_REQUIRE_ESM')) {
      throw new Error(`Module ${resolved} is an ES module; only CommonJS modules can be tracked.`);
    }
    throw error;
  }

  const code = pickExport(loaded, exportName);
  if (!code) {
    throw new Error(`Module ${resolved} has no function export named ${exportName}.`);
  }
  return code;
};
