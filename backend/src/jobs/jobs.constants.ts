export const CONVERGENCE_BATCH_QUEUE = 'convergence-batch';
export const RUN_BATCH_JOB = 'run-batch';
