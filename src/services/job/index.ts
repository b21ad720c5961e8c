export { createJob, getJob, startJob, updateJobProgress, finishJob } from './tracker.js';
export type { JobCompletion, JobProgress } from './tracker.js';
export { ValidationRunner } from './runner.js';
export type { ValidationRunnerDeps, StartJobInput } from './runner.js';
