/**
 * Queue module exports
 */

export { JobQueue, TaskHandle, PRIORITY_VALUES, type JobTask } from './job-queue.js';
