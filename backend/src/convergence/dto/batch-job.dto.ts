import { BatchAnalysisOptions, BatchAnalysisResult, ReturnPoint } from '../engine/convergence.types';

/** Options are resolved against configuration before the job is queued. */
export interface BatchJobPayload extends BatchAnalysisOptions {
  series: ReturnPoint[];
  requestId?: string;
}

export interface BatchJobStatusDto {
  jobId: string;
  state: string; // waiting | active | completed | failed | delayed | unknown
  result?: BatchAnalysisResult;
  failedReason?: string;
}
