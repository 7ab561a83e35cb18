import * as path from 'path';
import { MemoryConfigStore } from '../config_store/memory/memory_config_store';
import { ConfigManager } from './config_manager';

describe('ConfigManager', () => {
  const rootPath = path.resolve('/work/tracker');
  let configStore: MemoryConfigStore;
  let configManager: ConfigManager;

  beforeEach(() => {
    configStore = new MemoryConfigStore();
    configManager = new ConfigManager(configStore, rootPath);
  });

  describe('defaults', () => {
    it('should place the data file under .tasktally', () => {
      expect(configManager.getDataFilePath()).toBe(path.join(rootPath, '.tasktally', 'tasktally.json'));
    });

    it('should default to the abort strategy', () => {
      expect(configManager.getDefaultImportStrategy()).toBe('abort');
    });

    it('should fall back to the environment log level', () => {
      // NODE_ENV is "test" under jest
      expect(configManager.getLogLevel()).toBe('silent');
    });
  });

  describe('configured values', () => {
    it('should resolve a relative data file against the root', () => {
      configStore.setConfig({ dataFile: 'data/store.json' });

      expect(configManager.getDataFilePath()).toBe(path.join(rootPath, 'data', 'store.json'));
    });

    it('should keep an absolute data file', () => {
      const absolute = path.resolve('/var/lib/tasktally.json');
      configStore.setConfig({ dataFile: absolute });

      expect(configManager.getDataFilePath()).toBe(absolute);
    });

    it('should report every effective value', () => {
      configStore.setConfig({ defaultImportStrategy: 'merge', logLevel: 'debug' });

      expect(configManager.getResolvedConfig()).toEqual({
        rootPath,
        dataFile: path.join(rootPath, '.tasktally', 'tasktally.json'),
        defaultImportStrategy: 'merge',
        logLevel: 'debug',
      });
    });
  });

  describe('updateConfig', () => {
    it('should merge into the stored config and save it', () => {
      configStore.setConfig({ logLevel: 'warn' });

      const updated = configManager.updateConfig({ defaultImportStrategy: 'overwrite' });

      expect(updated).toEqual({ logLevel: 'warn', defaultImportStrategy: 'overwrite' });
      expect(configStore.getConfig()).toEqual(updated);
    });

    it('should create the config when none exists', () => {
      configManager.updateConfig({ dataFile: 'store.json' });

      expect(configStore.getConfig()).toEqual({ dataFile: 'store.json' });
    });
  });
});
