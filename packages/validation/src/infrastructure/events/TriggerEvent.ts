import { z } from 'zod';
import type { EventMode } from '@customer360/core';
import { EventShapeError, errorMessage } from '@customer360/core';

const triggerEventSchema = z.object({
  Records: z
    .array(
      z.object({
        s3: z.object({
          bucket: z.object({ name: z.string().min(1) }),
          object: z.object({ key: z.string().min(1) }),
        }),
      }),
    )
    .min(1),
});

export type TriggerEvent = z.infer<typeof triggerEventSchema>;

/** One object named by a trigger event, with its key already URL-decoded. */
export interface ObjectNotification {
  readonly bucket: string;
  readonly key: string;
}

/**
 * Extract the objects to process from an object-storage notification.
 * With `mode: 'first'` only the first record is returned.
 *
 * @throws EventShapeError when the event is missing or malformed.
 */
export function parseTriggerEvent(event: unknown, mode: EventMode = 'all'): ObjectNotification[] {
  const result = triggerEventSchema.safeParse(event);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new EventShapeError(`Invalid trigger event: ${issues.join('; ')}`);
  }

  const records = mode === 'first' ? result.data.Records.slice(0, 1) : result.data.Records;
  return records.map((record) => ({
    bucket: record.s3.bucket.name,
    key: decodeObjectKey(record.s3.object.key),
  }));
}

/** Notification keys are form-encoded: `+` is a space, the rest is percent-encoded. */
export function decodeObjectKey(key: string): string {
  try {
    return decodeURIComponent(key.replace(/\+/g, ' '));
  } catch (error) {
    throw new EventShapeError(`Invalid object key '${key}': ${errorMessage(error)}`, { cause: error });
  }
}
