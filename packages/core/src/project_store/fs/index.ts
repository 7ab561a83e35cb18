export { FsProjectStore } from './fs_project_store';
export type { FsProjectStoreOptions, DocumentSerializer } from './fs_project_store';
