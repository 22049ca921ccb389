import { z } from 'zod';
import { ProcedureEventSchema } from './procedures.schema.js';

// ============================================================
// Application Status
// ============================================================

/**
 * Application lifecycle status. "Primary" is a status, not a flag:
 * an application is the event's primary candidate iff status === 'primary'.
 */
export const ApplicationStatusSchema = z.enum(['pending', 'approved', 'primary', 'rejected', 'cancelled']);
export type ApplicationStatus = z.infer<typeof ApplicationStatusSchema>;

/** Statuses that still hold a place in (or are waiting for) the queue. */
export const ACTIVE_APPLICATION_STATUSES = ['pending', 'approved', 'primary'] as const satisfies readonly ApplicationStatus[];

export function isPrimary(application: { status: string }): boolean {
    return application.status === 'primary';
}

/** Admin-facing actions on a single application */
export const ApplicationActionSchema = z.enum(['approve', 'reject', 'promote', 'cancel']);
export type ApplicationAction = z.infer<typeof ApplicationActionSchema>;

// ============================================================
// Submission
// ============================================================

/** Max photos kept per application; extras are dropped with a warning */
export const MAX_APPLICATION_PHOTOS = 3;

/** One submission may cover at most one button row of events */
export const MAX_EVENTS_PER_SUBMISSION = 5;

/** Strips the separators people usually type into phone numbers */
export function normalizePhone(phone: string): string {
    return phone.replace(/[\s+\-()]/g, '');
}

export const PhoneSchema = z.string().trim().refine(
    (value) => /^\d{10,}$/.test(normalizePhone(value)),
    { message: 'Phone number must contain at least 10 digits' },
);

export const FullNameSchema = z.string().trim().min(1).max(200);

export const SubmitApplicationSchema = z.object({
    candidateDiscordId: z.string().min(1),
    eventIds: z.array(z.number().int().positive())
        .min(1)
        .max(MAX_EVENTS_PER_SUBMISSION)
        .refine((ids) => new Set(ids).size === ids.length, 'Duplicate event ids'),
    fullName: FullNameSchema,
    phone: PhoneSchema,
    consent: z.literal(true),
    photos: z.array(z.string().min(1)).default([]),
});

export type SubmitApplicationInput = z.input<typeof SubmitApplicationSchema>;
export type SubmitApplicationDto = z.infer<typeof SubmitApplicationSchema>;

export const SubmitApplicationResultSchema = z.object({
    applicationIds: z.array(z.number()),
    photosTruncated: z.boolean(),
});

export type SubmitApplicationResultDto = z.infer<typeof SubmitApplicationResultSchema>;

// ============================================================
// Queue View
// ============================================================

export const QueueEntrySchema = z.object({
    applicationId: z.number(),
    fullName: z.string(),
    phone: z.string(),
    status: ApplicationStatusSchema,
    position: z.number().int().min(0),
    createdAt: z.string().datetime(),
});

export type QueueEntryDto = z.infer<typeof QueueEntrySchema>;

export const QueueViewSchema = z.object({
    event: ProcedureEventSchema,
    entries: z.array(QueueEntrySchema),
});

export type QueueViewDto = z.infer<typeof QueueViewSchema>;
