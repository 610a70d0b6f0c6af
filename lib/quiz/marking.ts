// ============================================================
// Marking helpers
// Multiple-choice answers are marked locally against the stored
// correct index; free-text answers go through the marking model
// and arrive here as an AnswerJudgment.
// ============================================================

import type { AnswerJudgment } from "@/lib/parsing/judgment-parser";
import { readAnswerLetter } from "@/lib/parsing/question-parser";
import type { AnswerInput, Question } from "@/lib/schemas/quiz";

const LETTERS = "ABCD";

/**
 * Resolves a submitted choice to an option index. Accepts a bare letter
 * ("b", "B) 4") or the option text itself; anything else is null.
 */
export function resolveChoiceIndex(question: Question, submitted: string): number | null {
    const options = question.options ?? [];
    const trimmed = submitted.trim();
    if (!trimmed) {
        return null;
    }

    const byText = options.findIndex((option) => option.trim() === trimmed);
    if (byText !== -1) {
        return byText;
    }

    const letter = readAnswerLetter(trimmed);
    if (letter === null) {
        return null;
    }
    const index = LETTERS.indexOf(letter);
    return index !== -1 && index < options.length ? index : null;
}

export function markMultipleChoice(question: Question, submitted: string): AnswerJudgment {
    const options = question.options ?? [];
    const correctIndex = question.correctAnswerIndex;
    if (correctIndex === null || correctIndex >= options.length) {
        return {
            score: "Incorrect",
            isCorrect: false,
            correctAnswer: "",
            explanation: null,
            error: `Question ${question.id} has no answer key`,
        };
    }

    const correctAnswer = `${LETTERS[correctIndex]}) ${options[correctIndex]}`;
    const chosen = resolveChoiceIndex(question, submitted);
    const isCorrect = chosen === correctIndex;
    return {
        score: isCorrect ? "Full Marks" : "Incorrect",
        isCorrect,
        correctAnswer,
        explanation: question.rationale,
        error: null,
    };
}

export function toAnswerInput(
    questionId: string,
    studentAnswer: string,
    judgment: AnswerJudgment
): AnswerInput {
    return {
        questionId,
        studentAnswer,
        score: judgment.score,
        correctAnswer: judgment.correctAnswer,
        explanation: judgment.explanation,
        error: judgment.error,
    };
}
