import type { JobArguments, QualityScore } from '@customer360/core';
import { JobArgument, formatObjectUri } from '@customer360/core';
import type { FormatRegistry } from './FormatRegistry.js';

/** The consolidation job runs only after a file that contributed accepted records. */
export function shouldTrigger(acceptedInFile: number): boolean {
  return acceptedInFile > 0;
}

export interface JobArgumentsInput {
  readonly jobName: string;
  readonly bucket: string;
  readonly acceptedPrefix: string;
  readonly trackingTable: string;
  readonly databaseUrl: string;
  readonly quality: QualityScore;
}

/** Encode the consolidation job arguments. Dataset paths point at the accepted partitions of `bucket`. */
export function buildJobArguments(input: JobArgumentsInput, registry: FormatRegistry): JobArguments {
  const datasetUri = (directory: string): string =>
    formatObjectUri({ bucket: input.bucket, prefix: `${input.acceptedPrefix}${directory}/` });

  return {
    [JobArgument.JOB_NAME]: input.jobName,
    [JobArgument.CUSTOMERS_PATH]: datasetUri(registry.forKind('customer').directory),
    [JobArgument.PURCHASES_PATH]: datasetUri(registry.forKind('purchase').directory),
    [JobArgument.FEEDBACK_PATH]: datasetUri(registry.forKind('feedback').directory),
    [JobArgument.TRACKING_TABLE]: input.trackingTable,
    [JobArgument.DATABASE_URL]: input.databaseUrl,
    [JobArgument.DQ_SCORE]: String(input.quality.score),
    [JobArgument.ERROR_COUNT]: String(input.quality.rejectedCount),
  };
}
