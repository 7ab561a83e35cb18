export { Tracker } from './tracker';
export type { TrackerDependencies } from './tracker.types';
