import type { IConfigManager } from '../config_manager/config_manager.types';
import type { ImportEngine } from '../import_engine/import_engine';
import type { Logger } from '../logger/logger';
import type { ProjectStore } from '../project_store/project_store';

export type TrackerDependencies = {
  rootPath: string;
  configManager: IConfigManager;
  store: ProjectStore;
  /** Defaults to an engine over `store` */
  engine?: ImportEngine;
  logger?: Logger;
};
