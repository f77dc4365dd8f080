import { z } from 'zod';
import type { VariableEvent } from '../stepwise-types.js';

export const DEFAULT_EVENT_TYPE = 'ValueChanged';

export const variableEventSchema = z.object({
    key: z.string().min(1, 'key is required'),
    timestamp: z.number().finite(),
    value: z.number().finite(),
    eventType: z.string().default(DEFAULT_EVENT_TYPE)
});

export type VariableEventInput = z.input<typeof variableEventSchema>;

export type ParsedEvent =
    | { ok: true; event: VariableEvent; }
    | { ok: false; reason: string; };

/**
 * Validate one raw batch entry. Never throws.
 */
export function parseVariableEvent(raw: unknown): ParsedEvent {
    const result = variableEventSchema.safeParse(raw);
    if (!result.success) {
        const reason = result.error.issues
            .map((issue) => `${issue.path.join('.') || '(entry)'}: ${issue.message}`)
            .join('; ');
        return { ok: false, reason };
    }
    return { ok: true, event: Object.freeze(result.data) };
}

/**
 * Build an immutable event, filling in the default event type.
 */
export function createVariableEvent(
    key: string,
    timestamp: number,
    value: number,
    eventType: string = DEFAULT_EVENT_TYPE
): VariableEvent {
    return Object.freeze({ key, timestamp, value, eventType });
}
