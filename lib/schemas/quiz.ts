// ============================================================
// Zod schemas for the quiz data model
// Revision → Run → Question → Answer, plus question flags.
// Types are inferred from the schemas; storage validates against
// these at its boundary.
// ============================================================

import { z } from "zod/v4";

export const SCORE_TIERS = ["Full Marks", "Partial Marks", "Incorrect"] as const;

export const ScoreSchema = z.enum(SCORE_TIERS);
export const QuestionStyleSchema = z.enum(["free-text", "multiple-choice"]);
export const RunStatusSchema = z.enum(["running", "completed"]);
export const FlagTypeSchema = z.enum([
    "incorrect",
    "unclear",
    "too_easy",
    "too_hard",
    "other",
]);

// --- Ownership ------------------------------------------------

// Exactly one of the two is set; which one is fixed at creation.
const OwnerColumnsSchema = z.object({
    userId: z.string().min(1).nullable(),
    sessionId: z.string().min(1).nullable(),
});

// --- Revision -------------------------------------------------

export const RevisionInputSchema = z.object({
    id: z.string().min(1).optional(),
    name: z.string().trim().min(1).max(200),
    subject: z.string().trim().min(1).max(200),
    topics: z.array(z.string()).default([]),
    description: z.string().nullable().default(null),
    desiredQuestionCount: z.number().int().min(1).max(50),
    accuracyThreshold: z.number().int().min(0).max(100),
    questionStyle: QuestionStyleSchema.default("free-text"),
    uploadedFiles: z.array(z.string()).nullable().default(null),
    extractedTexts: z.record(z.string(), z.string()).default({}),
});

export const RevisionSchema = OwnerColumnsSchema.extend({
    id: z.string().min(1),
    name: z.string(),
    subject: z.string(),
    topics: z.array(z.string()),
    description: z.string().nullable(),
    desiredQuestionCount: z.number().int(),
    accuracyThreshold: z.number().int(),
    questionStyle: QuestionStyleSchema,
    uploadedFiles: z.array(z.string()).nullable(),
    extractedTexts: z.record(z.string(), z.string()),
    createdAt: z.string(),
});

// --- Run ------------------------------------------------------

export const RunInputSchema = z.object({
    id: z.string().min(1).optional(),
    revisionId: z.string().min(1),
});

export const RunSchema = OwnerColumnsSchema.extend({
    id: z.string().min(1),
    revisionId: z.string().min(1),
    status: RunStatusSchema,
    createdAt: z.string(),
});

// --- Question -------------------------------------------------

export const QuestionSchema = z
    .object({
        id: z.string().min(1),
        text: z.string().min(1),
        ordinal: z.number().int().min(1),
        questionStyle: QuestionStyleSchema,
        options: z.array(z.string()).nullable(),
        correctAnswerIndex: z.number().int().min(0).nullable(),
        rationale: z.string().nullable(),
    })
    .refine(
        (q) =>
            q.correctAnswerIndex === null ||
            (q.options !== null && q.correctAnswerIndex < q.options.length),
        { message: "correctAnswerIndex must point at one of the options" }
    );

// One run's batch: ids and ordinals are unique within it.
export const QuestionBatchSchema = z
    .array(QuestionSchema)
    .refine((batch) => new Set(batch.map((q) => q.id)).size === batch.length, {
        message: "question ids must be unique within a run",
    })
    .refine((batch) => new Set(batch.map((q) => q.ordinal)).size === batch.length, {
        message: "question ordinals must be unique within a run",
    });

export function questionId(runId: string, ordinal: number): string {
    return `${runId}-q${ordinal}`;
}

/** A batch bound for one run: every id is `{runId}-q{ordinal}`. */
export function questionBatchFor(runId: string) {
    return QuestionBatchSchema.refine(
        (batch) => batch.every((q) => q.id === questionId(runId, q.ordinal)),
        { message: "question ids must derive from the run id and ordinal" }
    );
}

// --- Answer ---------------------------------------------------

export const AnswerInputSchema = z.object({
    questionId: z.string().min(1),
    studentAnswer: z.string(),
    score: ScoreSchema,
    correctAnswer: z.string().default(""),
    explanation: z.string().nullable().default(null),
    error: z.string().nullable().default(null),
});

export const AnswerSchema = z.object({
    id: z.string().min(1),
    runId: z.string().min(1),
    questionId: z.string().min(1),
    studentAnswer: z.string(),
    score: ScoreSchema,
    isCorrect: z.boolean(),
    correctAnswer: z.string(),
    explanation: z.string().nullable(),
    error: z.string().nullable(),
    createdAt: z.string(),
});

// --- Question flag --------------------------------------------

export const QuestionFlagSchema = OwnerColumnsSchema.extend({
    id: z.string().min(1),
    runId: z.string().min(1),
    questionId: z.string().min(1),
    flagType: FlagTypeSchema,
    traceId: z.string().nullable(),
    createdAt: z.string(),
});

export const FlagInputSchema = z.object({
    questionId: z.string().min(1),
    flagType: FlagTypeSchema,
    traceId: z.string().min(1).nullable().default(null),
});

// --- Completed-run history ------------------------------------

export const RunSummarySchema = z.object({
    runId: z.string(),
    revisionId: z.string(),
    revisionName: z.string(),
    subject: z.string(),
    completedAt: z.string(),
    score: z.number(),
    totalQuestions: z.number().int(),
    threshold: z.number().int(),
});

export type Score = z.infer<typeof ScoreSchema>;
export type QuestionStyle = z.infer<typeof QuestionStyleSchema>;
export type RunStatus = z.infer<typeof RunStatusSchema>;
export type FlagType = z.infer<typeof FlagTypeSchema>;
export type RevisionInput = z.input<typeof RevisionInputSchema>;
export type Revision = z.infer<typeof RevisionSchema>;
export type RunInput = z.input<typeof RunInputSchema>;
export type Run = z.infer<typeof RunSchema>;
export type Question = z.infer<typeof QuestionSchema>;
export type AnswerInput = z.input<typeof AnswerInputSchema>;
export type Answer = z.infer<typeof AnswerSchema>;
export type QuestionFlag = z.infer<typeof QuestionFlagSchema>;
export type FlagInput = z.input<typeof FlagInputSchema>;
export type RunSummary = z.infer<typeof RunSummarySchema>;

/** `isCorrect` is derived from the tier and never set independently. */
export function isFullMarks(score: Score): boolean {
    return score === "Full Marks";
}
