import type { BatchTrigger, JobArguments } from '@customer360/core';
import type { ConsolidationJob } from '../../ConsolidationJob.js';
import { parseJobArguments } from '../arguments/JobParameters.js';

/**
 * `BatchTrigger` that runs the consolidation job in this process and resolves
 * once the run has finished. Resolves with the run id; when the run was
 * skipped, with the id of the run that blocked it.
 */
export class InProcessBatchTrigger implements BatchTrigger {
  constructor(private readonly job: ConsolidationJob) {}

  async startJobRun(jobName: string, args: JobArguments): Promise<string> {
    const params = { ...parseJobArguments(args), jobName };
    const result = await this.job.execute(params);
    return result.status === 'SKIPPED' ? result.activeRunId : result.runId;
  }
}
