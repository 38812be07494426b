// Re-export all schemas for convenience
export * from './events';

import { z } from 'zod';

export const DEFAULT_LAZY_BOUNDARY = '100px';

// Placeholder sentinels; any other value is treated as a placeholder image URL
export const PLACEHOLDER_EMPTY = 'empty';
export const PLACEHOLDER_BLUR = 'blur';

const MARGIN_COMPONENT = /^-?\d+(\.\d+)?(px|%)$/;

export function isRootMargin(value: string): boolean {
  const parts = value.trim().split(/\s+/);
  return parts.length >= 1 && parts.length <= 4 && parts.every(part => MARGIN_COMPONENT.test(part));
}

export const LoadingSchema = z.enum(['eager', 'lazy']);

export type Loading = z.infer<typeof LoadingSchema>;

// Pixels as a number, or a CSS margin of 1-4 px/% components.
// An empty string means "unset" and takes the default.
export const LazyBoundarySchema = z.union([
  z.number().finite().transform(pixels => `${pixels}px`),
  z.string().trim().refine(value => value === '' || isRootMargin(value), {
    message: 'Expected a margin of 1-4 components in px or %'
  })
]);

// Empty strings count as unset, like an omitted prop
export function createImageRequestSchema(defaultLazyBoundary: string = DEFAULT_LAZY_BOUNDARY) {
  return z.object({
    primarySource: z.string().trim().min(1, 'primarySource is required'),
    fallbackSource: z.string().trim().optional().transform(value => value || undefined),
    placeholder: z.string().trim().optional().transform(value => value || PLACEHOLDER_EMPTY),
    // Without it a "blur" placeholder paints as empty
    blurDataUrl: z.string().trim().optional().transform(value => value || undefined),
    loading: LoadingSchema.default('lazy'),
    lazyBoundary: LazyBoundarySchema.optional().transform(value => value || defaultLazyBoundary)
  })
    // The primary is never retried, so a fallback equal to it is no fallback
    .transform(request => ({
      ...request,
      fallbackSource: request.fallbackSource === request.primarySource ? undefined : request.fallbackSource
    }));
}

export const ImageRequestSchema = createImageRequestSchema();

export type ImageRequestInput = z.input<typeof ImageRequestSchema>;
export type ImageRequest = z.output<typeof ImageRequestSchema>;

export function isEager(request: ImageRequest): boolean {
  return request.loading === 'eager';
}

// Load state
export const LoadStateSchema = z.enum(['idle', 'pending', 'loading', 'loaded', 'failed']);

export type LoadState = z.infer<typeof LoadStateSchema>;

export const TERMINAL_STATES: ReadonlyArray<LoadState> = ['loaded', 'failed'];

export function isTerminal(state: LoadState): boolean {
  return TERMINAL_STATES.includes(state);
}

// Load attempts
export const AttemptKindSchema = z.enum(['primary', 'fallback']);

export type AttemptKind = z.infer<typeof AttemptKindSchema>;

export const LoadAttemptSchema = z.object({
  handleId: z.string().uuid(),
  source: z.string().min(1),
  attempt: z.union([z.literal(1), z.literal(2)]),
  kind: AttemptKindSchema
});

export type LoadAttempt = z.infer<typeof LoadAttemptSchema>;

// Outcome reported by the network or render collaborator.
// `source`, when given, must match the in-flight attempt or the result is dropped as stale.
export const LoadOutcomeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('success'), source: z.string().optional() }),
  z.object({ kind: z.literal('failure'), reason: z.string(), source: z.string().optional() })
]);

export type LoadOutcome = z.infer<typeof LoadOutcomeSchema>;

export const AttemptRecordSchema = z.object({
  source: z.string(),
  kind: AttemptKindSchema,
  outcome: LoadOutcomeSchema.optional()
});

export type AttemptRecord = z.infer<typeof AttemptRecordSchema>;

export const LoadSnapshotSchema = z.object({
  state: LoadStateSchema,
  currentSource: z.string().optional(),
  attempts: z.array(AttemptRecordSchema),
  disposed: z.boolean()
});

export type LoadSnapshot = z.infer<typeof LoadSnapshotSchema>;
