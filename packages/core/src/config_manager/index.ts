export {
  ConfigManager,
  TALLY_DIRECTORY,
  DEFAULT_DATA_FILE,
  DEFAULT_IMPORT_STRATEGY,
} from './config_manager';
export type {
  TallyConfig,
  ResolvedTallyConfig,
  IConfigManager,
} from './config_manager.types';
