export * from '../shared/ipc.js';
export * from './config.js';
export * from './drives.js';
export * from './errors.js';
export * from './flash.js';
export * from './image.js';
export * from './mounts.js';
export * from './privileged.js';
export { formatProgressLine, formatSize, type Executor, type RunResult } from './util.js';
export { runWorker, type WorkerArgs, type EventSink } from './worker.js';
