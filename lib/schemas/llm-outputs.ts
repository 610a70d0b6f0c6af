// ============================================================
// Zod schemas for raw model outputs
// Deliberately permissive: a noisy field falls back to undefined
// via .catch() so one bad key never rejects the whole payload.
// ============================================================

import { z } from "zod/v4";

const looseString = z.string().optional().catch(undefined);

// --- Answer marking -------------------------------------------

export const RawJudgmentSchema = z.object({
    score: looseString,
    is_correct: z.boolean().optional().catch(undefined),
    correct_answer: z
        .union([z.string(), z.number()])
        .transform(String)
        .optional()
        .catch(undefined),
    explanation: looseString,
});

export type RawJudgment = z.infer<typeof RawJudgmentSchema>;

// --- Multiple-choice generation (JSON fallback) ---------------

export const RawChoiceQuestionSchema = z.object({
    question: z.string().trim().min(1),
    options: z.array(z.union([z.string(), z.number()]).transform(String)).min(1),
    correct: looseString,
    rationale: looseString,
    explanation: looseString,
});

export const RawChoiceQuestionListSchema = z.array(z.unknown());
