import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CONFIG_FILE, loadConfig, parseConfigText } from '../src/config';
import { ConfigError } from '../src/errors';
import { createTempDir, TempDir } from './helpers/io';

function captureConfigError(action: () => unknown): ConfigError {
  try {
    action();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('loadConfig', () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    dir.remove();
  });

  it('falls back to defaults without a config file', () => {
    expect(loadConfig({ cwd: dir.path })).toEqual({
      options: { enableNavigation: false, highlightOnNavigate: false },
      source: undefined
    });
  });

  it('reads the default config file with comments and trailing commas', () => {
    const file = dir.write(CONFIG_FILE, '{\n  // spans on\n  "enableNavigation": true,\n}');

    expect(loadConfig({ cwd: dir.path })).toEqual({
      options: { enableNavigation: true, highlightOnNavigate: false },
      source: file
    });
  });

  it('reads options nested under the section key', () => {
    dir.write('custom.jsonc', '{"parseTreeInspector": {"highlightOnNavigate": true}}');

    const config = loadConfig({ cwd: dir.path, configPath: 'custom.jsonc' });

    expect(config.options).toEqual({ enableNavigation: false, highlightOnNavigate: true });
    expect(config.source).toBe(path.join(dir.path, 'custom.jsonc'));
  });

  it('lets explicit overrides win over the file', () => {
    dir.write(CONFIG_FILE, '{"enableNavigation": true, "highlightOnNavigate": true}');

    const config = loadConfig({
      cwd: dir.path,
      overrides: { enableNavigation: false, highlightOnNavigate: undefined }
    });

    expect(config.options).toEqual({ enableNavigation: false, highlightOnNavigate: true });
  });

  it('fails when an explicitly named file is missing', () => {
    const error = captureConfigError(() => loadConfig({ cwd: dir.path, configPath: 'missing.jsonc' }));

    expect(error.message).toMatch(/^Unable to read configuration file .*missing\.jsonc: /);
    expect(error.code).toBe('config');
  });
});

describe('parseConfigText', () => {
  it('treats an empty file as no options', () => {
    expect(parseConfigText('')).toEqual({});
  });

  it('treats a comments-only file as no options', () => {
    expect(parseConfigText('// nothing configured yet\n')).toEqual({});
  });

  it('rejects unknown options', () => {
    const error = captureConfigError(() => parseConfigText('{"theme": "dark"}', 'settings.jsonc'));

    expect(error.issues).toEqual(['/: unknown option "theme"']);
    expect(error.message).toBe('Invalid configuration file settings.jsonc:\n  - /: unknown option "theme"');
  });

  it('rejects options of the wrong type', () => {
    const error = captureConfigError(() => parseConfigText('{"enableNavigation": "yes"}'));

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^\/enableNavigation: must be boolean/);
  });

  it('reports syntax errors with their position', () => {
    const error = captureConfigError(() => parseConfigText('{"enableNavigation": }'));

    expect(error.issues[0]).toBe('ValueExpected at 1:22');
  });
});
