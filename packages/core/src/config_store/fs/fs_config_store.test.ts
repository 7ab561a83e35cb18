import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError, DetailedValidationError } from '../../errors/errors';
import { FsConfigStore } from './fs_config_store';

describe('FsConfigStore', () => {
  let rootPath: string;
  let configPath: string;

  beforeEach(() => {
    rootPath = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'fs-config-store-test-')));
    configPath = path.join(rootPath, '.tasktally', 'config.json');
  });

  afterEach(() => {
    fs.rmSync(rootPath, { recursive: true, force: true });
  });

  function writeConfig(content: string): void {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, content);
  }

  describe('loadConfig', () => {
    it('should return the parsed config', () => {
      writeConfig(JSON.stringify({ dataFile: 'data/store.json', logLevel: 'warn' }));

      expect(new FsConfigStore(rootPath).loadConfig()).toEqual({ dataFile: 'data/store.json', logLevel: 'warn' });
    });

    it('should return null when the file does not exist', () => {
      expect(new FsConfigStore(rootPath).loadConfig()).toBeNull();
    });

    it('should reject invalid JSON', () => {
      writeConfig('{ invalid json }');

      let caught: unknown;
      try {
        new FsConfigStore(rootPath).loadConfig();
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigError);
      expect(caught).toMatchObject({ source: configPath });
    });

    it('should reject a config that fails the schema', () => {
      writeConfig(JSON.stringify({ defaultImportStrategy: 'replace' }));

      expect(() => new FsConfigStore(rootPath).loadConfig()).toThrow(DetailedValidationError);
    });
  });

  describe('saveConfig', () => {
    it('should write .tasktally/config.json, creating the directory', () => {
      const store = new FsConfigStore(rootPath);

      store.saveConfig({ defaultImportStrategy: 'merge' });

      expect(store.configPath).toBe(configPath);
      expect(fs.readFileSync(configPath, 'utf-8')).toBe('{\n  "defaultImportStrategy": "merge"\n}');
      expect(store.loadConfig()).toEqual({ defaultImportStrategy: 'merge' });
    });
  });

  describe('findTallyRoot', () => {
    it('should walk up to the directory holding .tasktally', () => {
      fs.mkdirSync(path.join(rootPath, '.tasktally'));
      const nested = path.join(rootPath, 'src', 'deep');
      fs.mkdirSync(nested, { recursive: true });

      expect(FsConfigStore.findTallyRoot(nested)).toBe(rootPath);
    });

    it('should return null when no ancestor has .tasktally', () => {
      const nested = path.join(rootPath, 'src');
      fs.mkdirSync(nested);

      expect(FsConfigStore.findTallyRoot(nested)).toBeNull();
    });
  });
});
