import { readFile } from 'fs/promises';
import path from 'path';
import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import { TrackOptionsError } from '../errors';
import { TrackOptions } from '../model';
import { ColorName } from '../render/colors';

export interface EditorConfig {
  command: string;
  args?: string[];
}

export interface ViewerConfig {
  maxPageSize?: number;
  palette?: ColorName[];
  labelColors?: Record<string, ColorName>;
  editor?: EditorConfig;
}

export interface LoadViewerConfigOptions {
  /**
   * Directory containing `viewer.json` and `schema/`. Defaults to the package-level `config/` folder.
   */
  baseDir?: string;
  /**
   * A user configuration file layered over the defaults.
   */
  configPath?: string;
}

const DEFAULT_CONFIG_DIR = path.resolve(__dirname, '../../config');

const formatValidationErrors = (errors: ErrorObject[] | null | undefined): string =>
  (errors ?? [])
    .map((err) => {
      const location = err.instancePath.length > 0 ? err.instancePath : '(root)';
      return `${location} ${err.message ?? ''}`.trim();
    })
    .join('\n');

const parseJsonFile = async (filePath: string): Promise<unknown> => {
  const raw = await readFile(filePath, 'utf8');
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new Error(`Failed to parse JSON in ${filePath}: ${(error as Error).message}`);
  }
};

const memoizeValidator = <T>(ajv: Ajv) => {
  const cache = new Map<string, ValidateFunction<T>>();
  return async (schemaPath: string): Promise<ValidateFunction<T>> => {
    const cached = cache.get(schemaPath);
    if (cached) {
      return cached;
    }

    const schemaRaw = await readFile(schemaPath, 'utf8');
    const schemaJson = JSON.parse(schemaRaw);
    const validator = ajv.compile<T>(schemaJson);
    cache.set(schemaPath, validator);
    return validator;
  };
};

const getConfigValidator = memoizeValidator<ViewerConfig>(new Ajv({ allErrors: true, strict: false }));
const getOptionsValidator = memoizeValidator<TrackOptions>(
  new Ajv({ allErrors: true, strict: false, useDefaults: true, coerceTypes: true }),
);

const loadViewerConfigFile = async (filePath: string, configDir: string): Promise<ViewerConfig> => {
  const validator = await getConfigValidator(path.join(configDir, 'schema', 'viewer-config.schema.json'));
  const data = await parseJsonFile(filePath);

  if (!validator(data)) {
    const details = formatValidationErrors(validator.errors);
    throw new Error(`Viewer config at ${filePath} failed validation:\n${details}`.trim());
  }

  return data;
};

export const loadViewerConfig = async (options: LoadViewerConfigOptions = {}): Promise<ViewerConfig> => {
  const configDir = options.baseDir ?? DEFAULT_CONFIG_DIR;
  const defaults = await loadViewerConfigFile(path.join(configDir, 'viewer.json'), configDir);
  if (!options.configPath) {
    return defaults;
  }

  const user = await loadViewerConfigFile(path.resolve(options.configPath), configDir);
  return {
    ...defaults,
    ...user,
    labelColors: { ...defaults.labelColors, ...user.labelColors },
  };
};

const describeOptionError = (err: ErrorObject): string => {
  if (err.keyword === 'additionalProperties') {
    return `unknown option \`${String(err.params.additionalProperty)}\``;
  }
  const option = err.instancePath.replace(/^\//, '') || '(options)';
  return `option \`${option}\` ${err.message ?? 'is invalid'}`;
};

/**
 * Checks named options for {@link trackAllocations} and fills in defaults.
 * Fails with {@link TrackOptionsError} on unknown names or ill-typed values.
 */
export const validateTrackOptions = async (
  input: Readonly<Record<string, unknown>> = {},
  options: Pick<LoadViewerConfigOptions, 'baseDir'> = {},
): Promise<TrackOptions> => {
  const configDir = options.baseDir ?? DEFAULT_CONFIG_DIR;
  const validator = await getOptionsValidator(path.join(configDir, 'schema', 'track-options.schema.json'));
  const candidate = { ...input };

  if (!validator(candidate)) {
    const details = (validator.errors ?? []).map(describeOptionError).join('; ');
    throw new TrackOptionsError(`Invalid track options: ${details}`);
  }

  return candidate;
};
