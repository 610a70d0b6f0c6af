// ============================================================
// Question parser
// Model output → bounded list of Question records.
//
// Multiple choice: structured text first, JSON array second;
// the first strategy that yields anything wins for the whole input.
// Free text: one question per non-empty line.
// Never throws; an empty list means nothing was recoverable.
// ============================================================

import {
    RawChoiceQuestionListSchema,
    RawChoiceQuestionSchema,
} from "@/lib/schemas/llm-outputs";
import { questionId, type Question, type QuestionStyle } from "@/lib/schemas/quiz";
import { parseJson, stripCodeFence } from "./json-extract";
import {
    failure,
    firstSuccess,
    success,
    type ParseResult,
    type ParseStrategy,
} from "./result";

export const DEFAULT_RATIONALE = "Correct answer selected.";

// Only A–D are option letters; "E)" and beyond are ignored.
const OPTION_LETTERS = ["A", "B", "C", "D"] as const;

const QUESTION_LINE = /^QUESTION:\s*(.*)$/i;
const OPTION_LINE = /^([A-Z])\)\s*(.*)$/i;
const CORRECT_LINE = /^CORRECT:\s*(.*)$/i;
const RATIONALE_LINE = /^(?:RATIONALE|EXPLANATION):\s*(.*)$/i;
const LEADING_LETTER = /^(?:option\s+)?[([]?([A-Z])(?![A-Z])/i;
const BULLET_PREFIX = /^(?:[-*•]+|\d+[.)])\s*/;

interface ParseContext {
    runId: string;
    limit: number;
}

/** Maps "b", "B) 4", "(B)", "Option c" to the option letter, or null. */
export function readAnswerLetter(raw: string | undefined): string | null {
    if (raw === undefined) {
        return null;
    }
    const match = raw.trim().match(LEADING_LETTER);
    return match ? match[1].toUpperCase() : null;
}

function normalizeLimit(desiredCount: number): number {
    if (!Number.isFinite(desiredCount)) {
        return 0;
    }
    return Math.max(0, Math.floor(desiredCount));
}

function choiceQuestion(
    ctx: ParseContext,
    ordinal: number,
    text: string,
    options: string[],
    correctAnswerIndex: number,
    rationale: string
): Question {
    return {
        id: questionId(ctx.runId, ordinal),
        text,
        ordinal,
        questionStyle: "multiple-choice",
        options,
        correctAnswerIndex,
        rationale: rationale.length > 0 ? rationale : DEFAULT_RATIONALE,
    };
}

// --- Structured text ------------------------------------------

// One blank-line-separated group, or part of one when a group holds
// two QUESTION: lines. Prefixed lines may come in any order.
interface Fragment {
    question: string | null;
    letters: string[];
    options: string[];
    correct: string | null;
    hasCorrect: boolean;
    rationale: string[];
    hasRationale: boolean;
}

function emptyFragment(): Fragment {
    return {
        question: null,
        letters: [],
        options: [],
        correct: null,
        hasCorrect: false,
        rationale: [],
        hasRationale: false,
    };
}

function splitGroups(rawText: string): string[][] {
    const groups: string[][] = [];
    let current: string[] = [];
    for (const rawLine of rawText.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (line) {
            current.push(line);
        } else if (current.length > 0) {
            groups.push(current);
            current = [];
        }
    }
    if (current.length > 0) {
        groups.push(current);
    }
    return groups;
}

function readGroup(lines: string[]): Fragment[] {
    const fragments: Fragment[] = [];
    let fragment = emptyFragment();
    let inRationale = false;

    for (const line of lines) {
        const question = line.match(QUESTION_LINE);
        if (question) {
            if (fragment.question !== null) {
                fragments.push(fragment);
                fragment = emptyFragment();
            }
            fragment.question = question[1].trim();
            inRationale = false;
            continue;
        }

        const correct = line.match(CORRECT_LINE);
        if (correct) {
            fragment.hasCorrect = true;
            fragment.correct ??= readAnswerLetter(correct[1]);
            inRationale = false;
            continue;
        }

        const rationale = line.match(RATIONALE_LINE);
        if (rationale) {
            fragment.hasRationale = true;
            if (rationale[1].trim()) {
                fragment.rationale.push(rationale[1].trim());
            }
            inRationale = true;
            continue;
        }

        const option = line.match(OPTION_LINE);
        if (option) {
            inRationale = false;
            const letter = option[1].toUpperCase();
            const known = OPTION_LETTERS.some((l) => l === letter);
            if (known && !fragment.letters.includes(letter)) {
                fragment.letters.push(letter);
                fragment.options.push(option[2].trim());
            }
            continue;
        }

        if (inRationale) {
            fragment.rationale.push(line);
        }
    }
    fragments.push(fragment);
    return fragments;
}

// Two fragments belong to one question only when neither repeats a
// field the other already has.
function disjoint(a: Fragment, b: Fragment): boolean {
    return !(
        (a.question !== null && b.question !== null) ||
        (a.letters.length > 0 && b.letters.length > 0) ||
        (a.hasCorrect && b.hasCorrect) ||
        (a.hasRationale && b.hasRationale)
    );
}

function merge(a: Fragment, b: Fragment): Fragment {
    return {
        question: a.question ?? b.question,
        letters: [...a.letters, ...b.letters],
        options: [...a.options, ...b.options],
        correct: a.correct ?? b.correct,
        hasCorrect: a.hasCorrect || b.hasCorrect,
        rationale: [...a.rationale, ...b.rationale],
        hasRationale: a.hasRationale || b.hasRationale,
    };
}

/**
 * Blocks are blank-line-separated groups. A group is joined to the
 * block before it when their fields do not overlap, so blank lines
 * between a question and its options keep one block; a group that
 * repeats options or CORRECT starts its own block and is judged alone.
 */
function readBlocks(rawText: string): Fragment[] {
    const blocks: Fragment[] = [];
    for (const group of splitGroups(rawText)) {
        for (const fragment of readGroup(group)) {
            const last = blocks[blocks.length - 1];
            if (last !== undefined && disjoint(last, fragment)) {
                blocks[blocks.length - 1] = merge(last, fragment);
            } else {
                blocks.push(fragment);
            }
        }
    }
    return blocks;
}

function structuredTextStrategy(ctx: ParseContext): ParseStrategy<string, Question[]> {
    return {
        name: "structured-text",
        parse(rawText: string): ParseResult<Question[]> {
            const accepted: Question[] = [];
            for (const block of readBlocks(rawText)) {
                if (accepted.length >= ctx.limit) {
                    break;
                }
                if (!block.question || block.options.length === 0 || !block.correct) {
                    continue;
                }
                const correctIndex = block.letters.indexOf(block.correct);
                if (correctIndex === -1) {
                    continue;
                }
                accepted.push(
                    choiceQuestion(
                        ctx,
                        accepted.length + 1,
                        block.question,
                        block.options,
                        correctIndex,
                        block.rationale.join("\n").trim()
                    )
                );
            }
            return accepted.length > 0
                ? success(accepted)
                : failure("no complete QUESTION blocks");
        },
    };
}

// --- JSON array fallback --------------------------------------

function firstNonEmpty(...values: Array<string | undefined>): string {
    for (const value of values) {
        const trimmed = value?.trim();
        if (trimmed) {
            return trimmed;
        }
    }
    return "";
}

function jsonArrayStrategy(ctx: ParseContext): ParseStrategy<string, Question[]> {
    return {
        name: "json-array",
        parse(rawText: string): ParseResult<Question[]> {
            const parsed = parseJson(stripCodeFence(rawText));
            if (!parsed.ok) {
                return parsed;
            }
            const list = RawChoiceQuestionListSchema.safeParse(parsed.value);
            if (!list.success) {
                return failure("JSON value is not an array");
            }

            const accepted: Question[] = [];
            for (const item of list.data) {
                if (accepted.length >= ctx.limit) {
                    break;
                }
                const candidate = RawChoiceQuestionSchema.safeParse(item);
                if (!candidate.success) {
                    continue;
                }
                const options = candidate.data.options
                    .slice(0, OPTION_LETTERS.length)
                    .map((option) => option.trim());
                const letter = readAnswerLetter(candidate.data.correct);
                const correctIndex = OPTION_LETTERS.findIndex((l) => l === letter);
                if (correctIndex === -1 || correctIndex >= options.length) {
                    continue;
                }
                accepted.push(
                    choiceQuestion(
                        ctx,
                        accepted.length + 1,
                        candidate.data.question,
                        options,
                        correctIndex,
                        firstNonEmpty(candidate.data.rationale, candidate.data.explanation)
                    )
                );
            }
            return accepted.length > 0
                ? success(accepted)
                : failure("no usable question objects");
        },
    };
}

// --- Public API -----------------------------------------------

export function parseMultipleChoiceQuestions(
    rawText: string,
    runId: string,
    desiredCount: number
): Question[] {
    const ctx: ParseContext = { runId, limit: normalizeLimit(desiredCount) };
    if (ctx.limit === 0 || !rawText.trim()) {
        return [];
    }

    const outcome = firstSuccess(
        [structuredTextStrategy(ctx), jsonArrayStrategy(ctx)],
        rawText
    );
    if (!outcome.result.ok) {
        console.warn(`[parse/questions] run ${runId}: no questions recovered (${outcome.result.reason})`);
        return [];
    }
    if (outcome.strategy !== "structured-text") {
        console.info(`[parse/questions] run ${runId}: used ${outcome.strategy} fallback`);
    }
    return outcome.result.value;
}

export function parseFreeTextQuestions(
    rawText: string,
    runId: string,
    desiredCount: number
): Question[] {
    const limit = normalizeLimit(desiredCount);
    return rawText
        .split(/\r?\n/)
        .map((line) => line.trim().replace(BULLET_PREFIX, "").trim())
        .filter((line) => line.length > 0)
        .slice(0, limit)
        .map((text, index): Question => ({
            id: questionId(runId, index + 1),
            text,
            ordinal: index + 1,
            questionStyle: "free-text",
            options: null,
            correctAnswerIndex: null,
            rationale: null,
        }));
}

export function parseQuestions(
    rawText: string,
    runId: string,
    desiredCount: number,
    style: QuestionStyle
): Question[] {
    return style === "multiple-choice"
        ? parseMultipleChoiceQuestions(rawText, runId, desiredCount)
        : parseFreeTextQuestions(rawText, runId, desiredCount);
}
