export { MemoryProjectStore } from './memory_project_store';
export type { MemoryProjectStoreOptions } from './memory_project_store';
