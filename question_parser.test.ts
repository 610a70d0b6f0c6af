/// <reference types="node" />
/**
 * Tests question parsing from generation-model output.
 *
 * Used by: `npm test` (Node test runner).
 *
 * Key coverage:
 * - Structured-text blocks: accepted, discarded, letter casing, options past D.
 * - Blank-line groups: merged when their fields do not overlap, split otherwise.
 * - JSON array fallback and the desired-count cap.
 * - Free-text line questions with bullet stripping.
 *
 * Assumptions:
 * - Question ids follow "{runId}-q{ordinal}".
 */

import assert from "node:assert/strict";
import test from "node:test";
import {
    DEFAULT_RATIONALE,
    parseFreeTextQuestions,
    parseMultipleChoiceQuestions,
    parseQuestions,
    readAnswerLetter,
} from "@/lib/parsing/question-parser";

const TWO_PLUS_TWO = "QUESTION: 2+2?\nA) 3\nB) 4\nC) 5\nD) 6\nCORRECT: B\nRATIONALE: math";

test("structured block becomes one question with index and rationale", () => {
    const questions = parseMultipleChoiceQuestions(TWO_PLUS_TWO, "r1", 10);

    assert.deepEqual(questions, [
        {
            id: "r1-q1",
            text: "2+2?",
            ordinal: 1,
            questionStyle: "multiple-choice",
            options: ["3", "4", "5", "6"],
            correctAnswerIndex: 1,
            rationale: "math",
        },
    ]);
});

test("CORRECT letter outside A-D discards the block", () => {
    const raw = TWO_PLUS_TWO.replace("CORRECT: B", "CORRECT: E");
    assert.deepEqual(parseMultipleChoiceQuestions(raw, "r1", 10), []);
});

test("lowercase CORRECT letter matches and missing rationale gets the default", () => {
    const raw = "QUESTION: Capital of France?\nA) Paris\nB) Rome\ncorrect: a";
    const [question] = parseMultipleChoiceQuestions(raw, "run", 5);

    assert.equal(question.correctAnswerIndex, 0);
    assert.equal(question.rationale, DEFAULT_RATIONALE);
});

test("option lines past D are ignored, not fatal", () => {
    const raw = "QUESTION: Pick one\nA) a\nB) b\nC) c\nD) d\nE) e\nCORRECT: D";
    const [question] = parseMultipleChoiceQuestions(raw, "run", 5);

    assert.deepEqual(question.options, ["a", "b", "c", "d"]);
    assert.equal(question.correctAnswerIndex, 3);
});

test("discarded blocks do not consume ordinals", () => {
    const raw = [
        "QUESTION: First\nA) x\nCORRECT: C",
        "QUESTION: Second\nA) y\nB) z\nCORRECT: B\nEXPLANATION: because\nit is z",
    ].join("\n\n");
    const questions = parseMultipleChoiceQuestions(raw, "r9", 10);

    assert.equal(questions.length, 1);
    assert.equal(questions[0].id, "r9-q1");
    assert.equal(questions[0].text, "Second");
    assert.equal(questions[0].rationale, "because\nit is z");
});

test("blank line inside a question does not split it", () => {
    const raw = "QUESTION: Spaced out?\n\nA) yes\nB) no\n\nCORRECT: A";
    const questions = parseMultipleChoiceQuestions(raw, "r", 3);

    assert.equal(questions.length, 1);
    assert.deepEqual(questions[0].options, ["yes", "no"]);
});

test("a group that repeats options starts its own block instead of completing the one before", () => {
    const text = "QUESTION: Q1\nA) a\nB) b\n\nA) x\nB) y\nC) z\nCORRECT: C";

    assert.deepEqual(parseMultipleChoiceQuestions(text, "r", 10), []);
});

test("option lines may come before the QUESTION line", () => {
    const questions = parseMultipleChoiceQuestions("A) 3\nB) 4\nQUESTION: 2+2?\nCORRECT: B", "r", 10);

    assert.equal(questions.length, 1);
    assert.equal(questions[0].text, "2+2?");
    assert.deepEqual(questions[0].options, ["3", "4"]);
    assert.equal(questions[0].correctAnswerIndex, 1);
});

test("blank lines between question, options, answer and rationale keep one question", () => {
    const text = [
        "QUESTION: What is 2 + 2?",
        "",
        "A) 3",
        "B) 4",
        "C) 5",
        "D) 6",
        "",
        "CORRECT: B",
        "",
        "RATIONALE: Two plus two equals four.",
    ].join("\n");

    const questions = parseMultipleChoiceQuestions(text, "r", 10);

    assert.equal(questions.length, 1);
    assert.equal(questions[0].text, "What is 2 + 2?");
    assert.deepEqual(questions[0].options, ["3", "4", "5", "6"]);
    assert.equal(questions[0].correctAnswerIndex, 1);
    assert.equal(questions[0].rationale, "Two plus two equals four.");
});

test("CORRECT letter in parentheses is read", () => {
    const text = "QUESTION: Pick one\nA) x\nB) y\nCORRECT: (B)";

    assert.equal(parseMultipleChoiceQuestions(text, "r", 10)[0].correctAnswerIndex, 1);
});

test("structured text never returns more than the desired count", () => {
    const raw = [TWO_PLUS_TWO, TWO_PLUS_TWO, TWO_PLUS_TWO].join("\n\n");
    const questions = parseMultipleChoiceQuestions(raw, "r1", 2);

    assert.deepEqual(questions.map((q) => q.id), ["r1-q1", "r1-q2"]);
});

test("JSON array fallback maps letters and prefers rationale over explanation", () => {
    const raw = [
        "```json",
        JSON.stringify([
            { question: "Largest planet?", options: ["Mars", "Jupiter"], correct: "b", explanation: "gas giant" },
            { options: ["no question"], correct: "A" },
            { question: "H2O is?", options: ["water", "salt"], correct: "A", rationale: "", explanation: "chemistry" },
        ]),
        "```",
    ].join("\n");
    const questions = parseMultipleChoiceQuestions(raw, "j", 10);

    assert.equal(questions.length, 2);
    assert.deepEqual(questions[0].options, ["Mars", "Jupiter"]);
    assert.equal(questions[0].correctAnswerIndex, 1);
    assert.equal(questions[0].rationale, "gas giant");
    assert.equal(questions[1].id, "j-q2");
    assert.equal(questions[1].rationale, "chemistry");
});

test("JSON fallback is capped at the desired count", () => {
    const item = { question: "Q", options: ["a", "b"], correct: "A" };
    const raw = JSON.stringify([item, item, item]);

    assert.equal(parseMultipleChoiceQuestions(raw, "j", 2).length, 2);
});

test("unparseable text and non-positive counts yield an empty list", () => {
    assert.deepEqual(parseMultipleChoiceQuestions("no questions here", "r", 5), []);
    assert.deepEqual(parseMultipleChoiceQuestions(TWO_PLUS_TWO, "r", 0), []);
    assert.deepEqual(parseMultipleChoiceQuestions("   ", "r", 5), []);
});

test("every accepted question keeps its index inside its options", () => {
    const raw = [
        TWO_PLUS_TWO,
        "QUESTION: Only two\nA) one\nB) two\nCORRECT: D",
        "QUESTION: Three\nC) c\nA) a\nCORRECT: c",
    ].join("\n\n");
    const questions = parseMultipleChoiceQuestions(raw, "p", 10);

    assert.equal(questions.length, 2);
    for (const q of questions) {
        assert.ok(q.options !== null && q.correctAnswerIndex !== null);
        assert.ok(q.correctAnswerIndex >= 0 && q.correctAnswerIndex < q.options.length);
    }
    assert.deepEqual(questions[1].options, ["c", "a"]);
    assert.equal(questions[1].correctAnswerIndex, 0);
});

test("free-text lines strip bullets and drop blanks", () => {
    const raw = "- What is osmosis?\n\n2. Define entropy.\n* Why is the sky blue?\n";
    const questions = parseFreeTextQuestions(raw, "f", 2);

    assert.deepEqual(questions, [
        {
            id: "f-q1",
            text: "What is osmosis?",
            ordinal: 1,
            questionStyle: "free-text",
            options: null,
            correctAnswerIndex: null,
            rationale: null,
        },
        {
            id: "f-q2",
            text: "Define entropy.",
            ordinal: 2,
            questionStyle: "free-text",
            options: null,
            correctAnswerIndex: null,
            rationale: null,
        },
    ]);
});

test("parseQuestions dispatches on question style", () => {
    assert.equal(parseQuestions(TWO_PLUS_TWO, "r", 5, "multiple-choice").length, 1);
    assert.equal(parseQuestions(TWO_PLUS_TWO, "r", 10, "free-text").length, 7);
});

test("readAnswerLetter reads a leading single letter only", () => {
    assert.equal(readAnswerLetter(" b "), "B");
    assert.equal(readAnswerLetter("C) 5"), "C");
    assert.equal(readAnswerLetter("Bee"), null);
    assert.equal(readAnswerLetter("(B)"), "B");
    assert.equal(readAnswerLetter("[c]"), "C");
    assert.equal(readAnswerLetter("Option B"), "B");
    assert.equal(readAnswerLetter("Option"), null);
    assert.equal(readAnswerLetter(undefined), null);
});
