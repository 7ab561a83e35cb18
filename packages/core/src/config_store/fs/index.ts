export { FsConfigStore, createConfigManager } from './fs_config_store';
