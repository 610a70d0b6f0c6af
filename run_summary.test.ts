/// <reference types="node" />
/**
 * Tests run scoring and progress helpers.
 *
 * Used by: `npm test` (Node test runner).
 *
 * Key coverage:
 * - Tier points averaged over answered questions only.
 * - Next-question selection and derived completion.
 */

import assert from "node:assert/strict";
import test from "node:test";
import {
    computeAccuracy,
    deriveRunStatus,
    hasPassed,
    nextQuestion,
    scorePoints,
    summarizeRun,
} from "@/lib/quiz/summary";
import type { Answer, Question, Score } from "@/lib/schemas/quiz";

function answer(questionId: string, score: Score): Answer {
    return {
        id: `a-${questionId}`,
        runId: "run-1",
        questionId,
        studentAnswer: "text",
        score,
        isCorrect: score === "Full Marks",
        correctAnswer: "",
        explanation: null,
        error: null,
        createdAt: "2026-01-01T00:00:00.000Z",
    };
}

function question(ordinal: number): Question {
    return {
        id: `run-1-q${ordinal}`,
        text: `Question ${ordinal}`,
        ordinal,
        questionStyle: "free-text",
        options: null,
        correctAnswerIndex: null,
        rationale: null,
    };
}

test("Full Marks and Partial Marks average to 75", () => {
    const result = summarizeRun(
        { id: "run-1", revisionId: "rev-1" },
        [answer("run-1-q1", "Full Marks"), answer("run-1-q2", "Partial Marks")]
    );

    assert.equal(result.overallAccuracy, 75);
    assert.equal(result.fullMarks, 1);
    assert.equal(result.partialMarks, 1);
    assert.equal(result.incorrect, 0);
    assert.equal(result.runId, "run-1");
    assert.equal(result.revisionId, "rev-1");
    assert.equal(hasPassed(result, 75), true);
    assert.equal(hasPassed(result, 76), false);
});

test("tiers are worth 100, 50 and 0 points", () => {
    assert.deepEqual(
        [scorePoints("Full Marks"), scorePoints("Partial Marks"), scorePoints("Incorrect")],
        [100, 50, 0]
    );
});

test("accuracy is 0 with no answers and ignores unanswered questions", () => {
    assert.equal(computeAccuracy([]), 0);
    assert.equal(computeAccuracy([{ score: "Incorrect" }, { score: "Full Marks" }]), 50);
});

test("next question is the lowest unanswered ordinal", () => {
    const questions = [question(3), question(1), question(2)];

    assert.equal(nextQuestion(questions, [])?.ordinal, 1);
    assert.equal(nextQuestion(questions, [{ questionId: "run-1-q1" }])?.ordinal, 2);
    assert.equal(
        nextQuestion(questions, [{ questionId: "run-1-q1" }, { questionId: "run-1-q2" }, { questionId: "run-1-q3" }]),
        null
    );
});

test("a run completes only once every question has an answer", () => {
    const questions = [question(1), question(2)];

    assert.equal(deriveRunStatus([], []), "running");
    assert.equal(deriveRunStatus(questions, [{ questionId: "run-1-q1" }]), "running");
    assert.equal(
        deriveRunStatus(questions, [{ questionId: "run-1-q1" }, { questionId: "run-1-q2" }]),
        "completed"
    );
});
