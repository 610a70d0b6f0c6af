// ============================================================
// Run progress and scoring
// Pure functions over stored questions/answers. Completion is
// derived, never stored.
// ============================================================

import type { Answer, Question, RunStatus, Score } from "@/lib/schemas/quiz";

export const SCORE_POINTS: Record<Score, number> = {
    "Full Marks": 100,
    "Partial Marks": 50,
    "Incorrect": 0,
};

export interface TierCounts {
    fullMarks: number;
    partialMarks: number;
    incorrect: number;
}

export interface RunResult extends TierCounts {
    runId: string;
    revisionId: string;
    questions: Answer[];
    overallAccuracy: number;
}

export function scorePoints(score: Score): number {
    return SCORE_POINTS[score];
}

export function countTiers(answers: ReadonlyArray<Pick<Answer, "score">>): TierCounts {
    const counts: TierCounts = { fullMarks: 0, partialMarks: 0, incorrect: 0 };
    for (const answer of answers) {
        if (answer.score === "Full Marks") counts.fullMarks++;
        else if (answer.score === "Partial Marks") counts.partialMarks++;
        else counts.incorrect++;
    }
    return counts;
}

/** Mean of tier points over answered questions; 0 when nothing is answered. */
export function accuracyFromCounts(counts: TierCounts): number {
    const total = counts.fullMarks + counts.partialMarks + counts.incorrect;
    if (total === 0) {
        return 0;
    }
    const points =
        counts.fullMarks * SCORE_POINTS["Full Marks"] +
        counts.partialMarks * SCORE_POINTS["Partial Marks"];
    return points / total;
}

export function computeAccuracy(answers: ReadonlyArray<Pick<Answer, "score">>): number {
    return accuracyFromCounts(countTiers(answers));
}

export function summarizeRun(
    run: { id: string; revisionId: string },
    answers: Answer[]
): RunResult {
    const counts = countTiers(answers);
    return {
        runId: run.id,
        revisionId: run.revisionId,
        questions: answers,
        overallAccuracy: accuracyFromCounts(counts),
        ...counts,
    };
}

export function hasPassed(result: Pick<RunResult, "overallAccuracy">, threshold: number): boolean {
    return result.overallAccuracy >= threshold;
}

export function nextQuestion(
    questions: ReadonlyArray<Question>,
    answers: ReadonlyArray<Pick<Answer, "questionId">>
): Question | null {
    const answered = new Set(answers.map((a) => a.questionId));
    const ordered = [...questions].sort((a, b) => a.ordinal - b.ordinal);
    return ordered.find((q) => !answered.has(q.id)) ?? null;
}

export function deriveRunStatus(
    questions: ReadonlyArray<Question>,
    answers: ReadonlyArray<Pick<Answer, "questionId">>
): RunStatus {
    if (questions.length === 0) {
        return "running";
    }
    return nextQuestion(questions, answers) === null ? "completed" : "running";
}
