import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { MemsiftError } from '@memsift/types';
import {
  parseToml,
  loadConfig,
  findConfigFile,
  getConfigSearchPaths,
  ConfigLoadError,
} from './loader.js';

describe('TOML Loader', () => {
  describe('parseToml', () => {
    it('should parse a filter configuration', () => {
      const toml = `
[filter]
enabled = true

[[filter.providers]]
name = "openai"
model = "gpt-4o-mini"
api_key_env = "OPENAI_API_KEY"
priority = 1

[[filter.providers]]
name = "anthropic"
model = "claude-3-5-haiku-latest"
temperature = 0.5
priority = 2

[filter.session]
max_context_tokens = 5000

[logging]
level = "debug"
log_filter_decisions = false
      `;

      const config = parseToml(toml);

      expect(config).toEqual({
        filter: {
          enabled: true,
          providers: [
            { name: 'openai', model: 'gpt-4o-mini', api_key_env: 'OPENAI_API_KEY', priority: 1 },
            { name: 'anthropic', model: 'claude-3-5-haiku-latest', temperature: 0.5, priority: 2 },
          ],
          session: { max_context_tokens: 5000 },
        },
        logging: { level: 'debug', log_filter_decisions: false },
      });
    });

    it('should throw ConfigLoadError for invalid TOML', () => {
      const invalidToml = `
[filter
enabled = true
      `;

      expect(() => parseToml(invalidToml)).toThrow(ConfigLoadError);
    });
  });

  describe('loadConfig', () => {
    let testDir: string;

    beforeEach(() => {
      testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'memsift-loader-'));
    });

    afterEach(() => {
      fs.rmSync(testDir, { recursive: true, force: true });
    });

    it('should load a file from a custom path', () => {
      const configPath = path.join(testDir, 'memsift.toml');
      fs.writeFileSync(configPath, '[filter]\nenabled = false\n');

      expect(loadConfig({ configPath, env: {} })).toEqual({ filter: { enabled: false } });
    });

    it('should throw when the custom path does not exist', () => {
      const missing = path.join(testDir, 'missing.toml');

      expect(() => loadConfig({ configPath: missing, env: {} })).toThrow(
        `Configuration file not found: ${missing}`,
      );
    });

    it('should wrap parse failures with the file path', () => {
      const configPath = path.join(testDir, 'memsift.toml');
      fs.writeFileSync(configPath, '[filter\n');

      let caught: unknown;
      try {
        loadConfig({ configPath, env: {} });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigLoadError);
      expect(caught).toBeInstanceOf(MemsiftError);
      if (caught instanceof ConfigLoadError) {
        expect(caught.code).toBe('MEMSIFT_ERR_CONFIG');
        expect(caught.path).toBe(configPath);
        expect(caught.details).toEqual({ path: configPath });
      }
    });

    it('should read the path named by MEMSIFT_CONFIG in the given env', () => {
      const configPath = path.join(testDir, 'custom.toml');
      fs.writeFileSync(configPath, '[logging]\nlevel = "warn"\n');

      expect(loadConfig({ env: { MEMSIFT_CONFIG: configPath }, cwd: testDir })).toEqual({
        logging: { level: 'warn' },
      });
    });

    it('should prefer an explicit path over MEMSIFT_CONFIG', () => {
      const configPath = path.join(testDir, 'explicit.toml');
      fs.writeFileSync(configPath, '[filter]\nenabled = true\n');

      expect(
        loadConfig({ configPath, env: { MEMSIFT_CONFIG: path.join(testDir, 'absent.toml') } }),
      ).toEqual({ filter: { enabled: true } });
    });

    it('should search the given working directory before the home directory', () => {
      const home = path.join(testDir, 'home');
      fs.mkdirSync(path.join(home, '.memsift'), { recursive: true });
      fs.writeFileSync(path.join(home, '.memsift', 'memsift.toml'), '[filter]\nenabled = false\n');
      fs.writeFileSync(path.join(testDir, 'memsift.toml'), '[filter]\nenabled = true\n');

      expect(loadConfig({ env: { HOME: home }, cwd: testDir })).toEqual({ filter: { enabled: true } });
    });

    it('should list the searched paths when no file is found', () => {
      const home = path.join(testDir, 'home');

      expect(() => loadConfig({ env: { HOME: home }, cwd: testDir })).toThrow(
        `No memsift.toml found in: ${path.join(testDir, 'memsift.toml')}, ${path.join(home, '.memsift', 'memsift.toml')}`,
      );
    });
  });

  describe('getConfigSearchPaths', () => {
    it('should derive the home location from the given env', () => {
      expect(getConfigSearchPaths({ HOME: '/home/test' }, '/work')).toEqual([
        path.join('/work', 'memsift.toml'),
        path.join('/home/test', '.memsift', 'memsift.toml'),
      ]);
    });

    it('should fall back to USERPROFILE', () => {
      expect(getConfigSearchPaths({ USERPROFILE: '/users/test' }, '/work')).toEqual([
        path.join('/work', 'memsift.toml'),
        path.join('/users/test', '.memsift', 'memsift.toml'),
      ]);
    });

    it('should search only the working directory without a home directory', () => {
      expect(getConfigSearchPaths({}, '/work')).toEqual([path.join('/work', 'memsift.toml')]);
    });
  });

  describe('findConfigFile', () => {
    it('should return the first existing path', () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'memsift-find-'));
      const present = path.join(dir, 'memsift.toml');
      fs.writeFileSync(present, '');

      expect(findConfigFile([path.join(dir, 'absent.toml'), present])).toBe(present);
      expect(findConfigFile([path.join(dir, 'absent.toml')])).toBeNull();

      fs.rmSync(dir, { recursive: true, force: true });
    });
  });
});
