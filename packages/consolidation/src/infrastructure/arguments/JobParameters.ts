import { z } from 'zod';
import type { JobArguments, ObjectLocation } from '@customer360/core';
import { ConfigurationError, JobArgument, parseObjectUri } from '@customer360/core';

const objectUri = z.string().transform((value, ctx): ObjectLocation => {
  const location = parseObjectUri(value);
  if (!location) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a URI like s3://bucket/prefix/' });
    return z.NEVER;
  }
  return location;
});

const numeric = z.string().trim().min(1).pipe(z.coerce.number());

const jobArgumentsSchema = z.object({
  [JobArgument.JOB_NAME]: z.string().min(1),
  [JobArgument.CUSTOMERS_PATH]: objectUri,
  [JobArgument.PURCHASES_PATH]: objectUri,
  [JobArgument.FEEDBACK_PATH]: objectUri,
  [JobArgument.TRACKING_TABLE]: z.string().min(1),
  [JobArgument.DATABASE_URL]: z.string().default(''),
  [JobArgument.DQ_SCORE]: numeric.pipe(z.number().min(0).max(100)),
  [JobArgument.ERROR_COUNT]: numeric.pipe(z.number().int().min(0)),
});

/** Decoded consolidation job arguments. */
export interface JobParameters {
  readonly jobName: string;
  readonly customersPath: ObjectLocation;
  readonly purchasesPath: ObjectLocation;
  readonly feedbackPath: ObjectLocation;
  readonly trackingTable: string;
  readonly databaseUrl: string;
  readonly dqScore: number;
  readonly errorCount: number;
}

/**
 * Decode the string-encoded `--NAME` arguments the validation stage passes.
 *
 * @throws ConfigurationError listing every missing or invalid argument.
 */
export function parseJobArguments(args: JobArguments): JobParameters {
  const result = jobArgumentsSchema.safeParse(args);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid job arguments: ${issues.join('; ')}`);
  }

  const data = result.data;
  return {
    jobName: data[JobArgument.JOB_NAME],
    customersPath: data[JobArgument.CUSTOMERS_PATH],
    purchasesPath: data[JobArgument.PURCHASES_PATH],
    feedbackPath: data[JobArgument.FEEDBACK_PATH],
    trackingTable: data[JobArgument.TRACKING_TABLE],
    databaseUrl: data[JobArgument.DATABASE_URL],
    dqScore: data[JobArgument.DQ_SCORE],
    errorCount: data[JobArgument.ERROR_COUNT],
  };
}
