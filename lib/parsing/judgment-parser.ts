// ============================================================
// Judgment parser
// Marking-model output → AnswerJudgment (tier score, correct
// answer, explanation). Recovers from code fences and chatter
// around the JSON; total failure becomes an error judgment.
// ============================================================

import { RawJudgmentSchema, type RawJudgment } from "@/lib/schemas/llm-outputs";
import { ScoreSchema, isFullMarks, type Score } from "@/lib/schemas/quiz";
import { findBalancedObject, parseJsonObject, stripCodeFence } from "./json-extract";
import {
    failure,
    firstSuccess,
    success,
    type ParseResult,
    type ParseStrategy,
} from "./result";

export interface AnswerJudgment {
    score: Score;
    isCorrect: boolean;
    correctAnswer: string;
    explanation: string | null;
    error: string | null;
}

const directObject: ParseStrategy<string, Record<string, unknown>> = {
    name: "direct",
    parse: (text) => parseJsonObject(text),
};

const embeddedObject: ParseStrategy<string, Record<string, unknown>> = {
    name: "brace-scan",
    parse(text) {
        const candidate = findBalancedObject(text);
        return candidate === null
            ? failure("no balanced {...} found")
            : parseJsonObject(candidate);
    },
};

/**
 * The `is_correct` fallback can only produce Full Marks or Incorrect:
 * a boolean has no partial tier. Kept that way on purpose.
 */
function resolveScore(raw: RawJudgment): Score {
    const tier = ScoreSchema.safeParse(raw.score);
    if (tier.success) {
        return tier.data;
    }
    return raw.is_correct === true ? "Full Marks" : "Incorrect";
}

export function defaultExplanation(score: Score, correctAnswer: string): string {
    switch (score) {
        case "Full Marks":
            return "Your answer is completely correct. Well done!";
        case "Partial Marks":
            return `Your answer is partially correct. The complete answer is: ${correctAnswer}.`;
        case "Incorrect":
            return `The correct answer is: ${correctAnswer}. Please review the question and try again.`;
    }
}

function toJudgment(raw: RawJudgment): AnswerJudgment {
    const score = resolveScore(raw);
    const correctAnswer = raw.correct_answer ?? "";
    const explanation = raw.explanation?.trim();
    return {
        score,
        // Recomputed from the tier; any is_correct in the payload is ignored here.
        isCorrect: isFullMarks(score),
        correctAnswer,
        explanation: explanation ? explanation : defaultExplanation(score, correctAnswer),
        error: null,
    };
}

/**
 * Strict variant: reports failure instead of building an error judgment.
 */
export function interpretJudgment(rawText: string): ParseResult<AnswerJudgment> {
    const stripped = stripCodeFence(rawText);
    const outcome = firstSuccess([directObject, embeddedObject], stripped || rawText);
    if (!outcome.result.ok) {
        return outcome.result;
    }
    const raw = RawJudgmentSchema.safeParse(outcome.result.value);
    if (!raw.success) {
        return failure("judgment object has an unexpected shape");
    }
    return success(toJudgment(raw.data));
}

export function judgmentFailure(reason: string): AnswerJudgment {
    return {
        score: "Incorrect",
        isCorrect: false,
        correctAnswer: "",
        explanation: null,
        error: `Could not read the marking response: ${reason}`,
    };
}

export function parseJudgment(rawText: string): AnswerJudgment {
    const result = interpretJudgment(rawText);
    if (result.ok) {
        return result.value;
    }
    console.warn(`[parse/judgment] unrecoverable marking output (${rawText.length} chars)`);
    return judgmentFailure(result.reason);
}
