import * as fs from 'fs';
import * as path from 'path';
import Ajv, { ErrorObject, JSONSchemaType } from 'ajv';
import { parse, ParseError } from 'jsonc-parser';
import { ConfigError, describeError, isNodeError } from './errors';
import { defaultParseOptions, describeParseError } from './jsonAnalysis';
import { defaultTreeViewOptions, resolveTreeViewOptions, TreeViewOptions } from './viewSession';

export const CONFIG_FILE = 'parse-tree-inspector.jsonc';
export const CONFIG_SECTION = 'parseTreeInspector';

type ConfigFileOptions = Partial<TreeViewOptions>;

const optionsSchema: JSONSchemaType<ConfigFileOptions> = {
  type: 'object',
  properties: {
    enableNavigation: { type: 'boolean', nullable: true },
    highlightOnNavigate: { type: 'boolean', nullable: true }
  },
  additionalProperties: false
};

const ajv = new Ajv({ allErrors: true });
const validateOptions = ajv.compile(optionsSchema);

export interface LoadedConfig {
  options: TreeViewOptions;
  source?: string;
}

export interface LoadConfigRequest {
  cwd?: string;
  configPath?: string;
  overrides?: Partial<TreeViewOptions>;
}

/**
 * Resolves options from defaults, then the config file, then explicit
 * overrides. A missing default config file is fine; a missing file named
 * with `configPath` is not.
 */
export function loadConfig(request: LoadConfigRequest = {}): LoadedConfig {
  const cwd = request.cwd ?? process.cwd();
  const explicit = request.configPath !== undefined;
  const file = path.resolve(cwd, request.configPath ?? CONFIG_FILE);

  let fromFile: ConfigFileOptions = {};
  let source: string | undefined;
  const text = readConfigText(file, explicit);
  if (text !== undefined) {
    fromFile = parseConfigText(text, file);
    source = file;
  }

  return {
    options: resolveTreeViewOptions({ ...defaultTreeViewOptions, ...fromFile, ...withoutUndefined(request.overrides) }),
    source
  };
}

export function parseConfigText(text: string, file = CONFIG_FILE): ConfigFileOptions {
  const errors: ParseError[] = [];
  const parsed: unknown = parse(text, errors, { ...defaultParseOptions, allowEmptyContent: true });
  if (errors.length) {
    throw new ConfigError(
      `Invalid configuration file ${file}:`,
      errors.map((error) => describeParseError(text, error))
    );
  }
  if (parsed === undefined) {
    return {};
  }

  const candidate = isRecord(parsed) && CONFIG_SECTION in parsed ? parsed[CONFIG_SECTION] : parsed;
  if (!validateOptions(candidate)) {
    throw new ConfigError(`Invalid configuration file ${file}:`, formatSchemaErrors(validateOptions.errors ?? []));
  }
  return candidate;
}

function readConfigText(file: string, required: boolean): string | undefined {
  try {
    return fs.readFileSync(file, 'utf8');
  } catch (error) {
    if (!required && isNodeError(error) && error.code === 'ENOENT') {
      return undefined;
    }
    throw new ConfigError(`Unable to read configuration file ${file}: ${describeError(error)}`);
  }
}

function formatSchemaErrors(errors: ErrorObject[]): string[] {
  return errors.map((error) => {
    const pointer = error.instancePath || '/';
    if (error.keyword === 'additionalProperties') {
      const property: unknown = error.params.additionalProperty;
      return `${pointer}: unknown option "${typeof property === 'string' ? property : ''}"`;
    }
    return `${pointer}: ${error.message ?? error.keyword}`;
  });
}

function withoutUndefined(overrides: Partial<TreeViewOptions> = {}): Partial<TreeViewOptions> {
  const result: Partial<TreeViewOptions> = {};
  if (overrides.enableNavigation !== undefined) {
    result.enableNavigation = overrides.enableNavigation;
  }
  if (overrides.highlightOnNavigate !== undefined) {
    result.highlightOnNavigate = overrides.highlightOnNavigate;
  }
  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
