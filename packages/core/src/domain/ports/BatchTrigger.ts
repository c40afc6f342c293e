/** String-encoded arguments passed to the consolidation job, keyed `--NAME`. */
export type JobArguments = Readonly<Record<string, string>>;

/** Port for starting the consolidation job once enough accepted data exists. */
export interface BatchTrigger {
  /** Start a run of `jobName`. Resolves with an identifier of the started run. */
  startJobRun(jobName: string, args: JobArguments): Promise<string>;
}

/** Argument names understood by the consolidation job. */
export const JobArgument = {
  JOB_NAME: '--JOB_NAME',
  CUSTOMERS_PATH: '--VALIDATED_CUSTOMERS_PATH',
  PURCHASES_PATH: '--VALIDATED_PURCHASES_PATH',
  FEEDBACK_PATH: '--VALIDATED_FEEDBACK_PATH',
  TRACKING_TABLE: '--TRACKING_TABLE',
  DATABASE_URL: '--DATABASE_URL',
  DQ_SCORE: '--DQ_SCORE',
  ERROR_COUNT: '--ERROR_COUNT',
} as const;
