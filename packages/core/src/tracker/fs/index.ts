export { createTracker } from './fs_tracker';
