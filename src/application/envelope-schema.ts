import { z } from 'zod';
import { DecodeError } from '../domain/index.js';
import type { DecodeLayer, Envelope, LifecycleMessage } from '../domain/index.js';

/** RFC 3339 timestamp, `Z` or numeric offset, any fractional precision. */
export const timestampSchema = z.string().datetime({ offset: true });

// Absent and null fields decode to their zero value, like the producer expects.
const text = z.string().nullish().transform((v) => v ?? '');
const time = timestampSchema.nullish().transform((v) => v ?? undefined);

/**
 * Outer notification wrapper. `Message` carries the lifecycle event
 * as a JSON-encoded string.
 */
export const envelopeSchema = z
  .object({
    Type: text,
    Subject: text,
    Time: time,
    Message: text,
  })
  .transform((raw): Envelope => ({
    type: raw.Type,
    subject: raw.Subject,
    time: raw.Time,
    message: raw.Message,
  }));

/** Lifecycle hook event as published by the scaling group. */
export const lifecycleMessageSchema = z
  .object({
    Time: time,
    AutoScalingGroupName: text,
    EC2InstanceId: text,
    LifecycleActionToken: text,
    LifecycleTransition: text,
    LifecycleHookName: text,
  })
  .transform((raw): LifecycleMessage => ({
    time: raw.Time,
    groupName: raw.AutoScalingGroupName,
    instanceId: raw.EC2InstanceId,
    actionToken: raw.LifecycleActionToken,
    transition: raw.LifecycleTransition,
    hookName: raw.LifecycleHookName,
  }));

export type DecodeResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: DecodeError };

function decode<S extends z.ZodTypeAny>(
  layer: DecodeLayer,
  raw: string,
  schema: S,
): DecodeResult<z.output<S>> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err: unknown) {
    return { ok: false, error: new DecodeError(layer, `${layer} is not valid JSON`, { cause: err }) };
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return { ok: false, error: new DecodeError(layer, `${layer} has an unexpected shape (${issues})`, { cause: parsed.error }) };
  }

  return { ok: true, value: parsed.data };
}

/** Decodes a raw channel item into its envelope. */
export function decodeEnvelope(raw: string): DecodeResult<Envelope> {
  return decode('envelope', raw, envelopeSchema);
}

/** Decodes an envelope's `message` into a lifecycle event. */
export function decodeMessage(body: string): DecodeResult<LifecycleMessage> {
  return decode('message', body, lifecycleMessageSchema);
}
