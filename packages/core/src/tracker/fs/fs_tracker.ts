import { createConfigManager } from '../../config_store/fs/fs_config_store';
import { createLogger } from '../../logger/logger';
import { FsProjectStore } from '../../project_store/fs/fs_project_store';
import { Tracker } from '../tracker';

/**
 * Create a Tracker for a root directory.
 *
 * Reads `.tasktally/config.json`, opens the configured data file and
 * gives every component a logger at the configured level. Auto-detects the
 * root when none is given.
 *
 * @throws ConfigError when the config or the data file is invalid
 */
export function createTracker(rootPath?: string): Tracker {
  const configManager = createConfigManager(rootPath);
  const { rootPath: resolvedRoot, dataFile, logLevel } = configManager.getResolvedConfig();

  const store = new FsProjectStore({
    filePath: dataFile,
    logger: createLogger('[ProjectStore] ', logLevel),
  });

  return new Tracker({
    rootPath: resolvedRoot,
    configManager,
    store,
    logger: createLogger('[Tracker] ', logLevel),
  });
}
