import { z } from 'zod';

// ============================================================
// Procedure Types
// ============================================================

export const ProcedureTypeNameSchema = z.string().trim().min(1).max(100);

export const ProcedureTypeSchema = z.object({
    id: z.number(),
    name: z.string(),
    isActive: z.boolean(),
});

export type ProcedureTypeDto = z.infer<typeof ProcedureTypeSchema>;

// ============================================================
// Event (procedure slot) Schemas
// ============================================================

/** Event lifecycle: draft -> published -> cancelled | archived */
export const EventStatusSchema = z.enum(['draft', 'published', 'cancelled', 'archived']);
export type EventStatus = z.infer<typeof EventStatusSchema>;

/** Forward-only event status transitions. */
export const EVENT_STATUS_TRANSITIONS: Record<EventStatus, readonly EventStatus[]> = {
    draft: ['published', 'cancelled'],
    published: ['cancelled', 'archived'],
    cancelled: [],
    archived: [],
};

/** Bookable slots: 09:00 to 17:00 in 10-minute steps */
export const TIME_SLOTS: readonly string[] = (() => {
    const slots: string[] = [];
    for (let hour = 9; hour <= 17; hour++) {
        for (let minute = 0; minute < 60; minute += 10) {
            if (hour === 17 && minute > 0) break;
            slots.push(`${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`);
        }
    }
    return slots;
})();

export const EventDateSchema = z.string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be YYYY-MM-DD')
    .refine((value) => !Number.isNaN(Date.parse(`${value}T00:00:00Z`)), 'Date is not a valid calendar date');

export const EventTimeSchema = z.string()
    .regex(/^\d{2}:\d{2}$/, 'Time must be HH:MM')
    .refine((value) => TIME_SLOTS.includes(value), 'Time must be a 10-minute slot between 09:00 and 17:00');

/** Schema for creating a draft event */
export const CreateProcedureEventSchema = z.object({
    date: EventDateSchema,
    time: EventTimeSchema,
    procedureTypeId: z.number().int().positive(),
    needsPhoto: z.boolean().default(false),
    comment: z.string().trim().max(1000).optional(),
});

export type CreateProcedureEventInput = z.input<typeof CreateProcedureEventSchema>;
export type CreateProcedureEventDto = z.infer<typeof CreateProcedureEventSchema>;

export const ProcedureEventSchema = z.object({
    id: z.number(),
    date: z.string(),
    time: z.string(),
    procedureTypeId: z.number(),
    procedureName: z.string(),
    needsPhoto: z.boolean(),
    comment: z.string().nullable(),
    status: EventStatusSchema,
});

export type ProcedureEventDto = z.infer<typeof ProcedureEventSchema>;
