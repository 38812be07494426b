import { z } from 'zod';

const StateSchema = z.enum(['idle', 'pending', 'loading', 'loaded', 'failed']);

// Event: STATE_CHANGED
export const StateChangedEventSchema = z.object({
  handleId: z.string().uuid(),
  from: StateSchema,
  to: StateSchema,
  ts: z.string().datetime()
});

export type StateChangedEvent = z.infer<typeof StateChangedEventSchema>;

// Event: LOAD_ISSUED
export const LoadIssuedEventSchema = z.object({
  handleId: z.string().uuid(),
  source: z.string(),
  attempt: z.union([z.literal(1), z.literal(2)]),
  kind: z.enum(['primary', 'fallback']),
  ts: z.string().datetime()
});

export type LoadIssuedEvent = z.infer<typeof LoadIssuedEventSchema>;

// Event: LOADED
export const LoadedEventSchema = z.object({
  handleId: z.string().uuid(),
  source: z.string(),
  usedFallback: z.boolean(),
  ts: z.string().datetime()
});

export type LoadedEvent = z.infer<typeof LoadedEventSchema>;

// Event: FAILED
export const FailedEventSchema = z.object({
  handleId: z.string().uuid(),
  code: z.string(),
  reason: z.string(),
  attempts: z.number().int().min(0).max(2),
  ts: z.string().datetime()
});

export type FailedEvent = z.infer<typeof FailedEventSchema>;

// Union of all controller events
export const ControllerEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('STATE_CHANGED'), data: StateChangedEventSchema }),
  z.object({ type: z.literal('LOAD_ISSUED'), data: LoadIssuedEventSchema }),
  z.object({ type: z.literal('LOADED'), data: LoadedEventSchema }),
  z.object({ type: z.literal('FAILED'), data: FailedEventSchema })
]);

export type ControllerEvent = z.infer<typeof ControllerEventSchema>;
