/// <reference types="node" />
/**
 * Tests the in-process storage backend directly.
 *
 * Used by: `npm test` (Node test runner).
 *
 * Key coverage:
 * - Returned rows are copies; callers cannot mutate stored state.
 * - Integrity errors for duplicate ids and dangling references.
 * - Completed-run summaries: newest first, latest answer as completion time.
 * - Instances never share state.
 */

import assert from "node:assert/strict";
import test from "node:test";
import { ownerKey } from "@/lib/access/scope";
import type { Answer, Revision, Run } from "@/lib/schemas/quiz";
import { MemoryBackend } from "@/lib/storage/memory-backend";
import { StorageError } from "@/lib/storage/types";

const OWNER = ownerKey({ kind: "user", userId: "u1" });

const revision: Revision = {
    id: "rev-1",
    userId: "u1",
    sessionId: null,
    name: "Cells",
    subject: "Biology",
    topics: ["mitosis"],
    description: null,
    desiredQuestionCount: 2,
    accuracyThreshold: 60,
    questionStyle: "free-text",
    uploadedFiles: null,
    extractedTexts: {},
    createdAt: "2026-01-01T00:00:00.000Z",
};

function run(id: string): Run {
    return {
        id,
        revisionId: "rev-1",
        userId: "u1",
        sessionId: null,
        status: "running",
        createdAt: "2026-01-01T00:00:01.000Z",
    };
}

function answer(runId: string, questionId: string, createdAt: string): Answer {
    return {
        id: `a-${runId}-${questionId}`,
        runId,
        questionId,
        studentAnswer: "text",
        score: "Incorrect",
        isCorrect: false,
        correctAnswer: "",
        explanation: null,
        error: null,
        createdAt,
    };
}

test("rows handed out are copies", async () => {
    const backend = new MemoryBackend();
    await backend.insertRevision(revision);

    const listed = await backend.listRevisions(OWNER);
    listed[0].topics.push("meiosis");

    assert.deepEqual((await backend.findRevision(OWNER, "rev-1"))?.topics, ["mitosis"]);
});

test("duplicate ids and dangling references are storage errors", async () => {
    const backend = new MemoryBackend();
    await backend.insertRevision(revision);

    await assert.rejects(backend.insertRevision(revision), StorageError);
    await assert.rejects(backend.insertRun({ ...run("r1"), revisionId: "missing" }), StorageError);
    await assert.rejects(backend.replaceQuestions("missing", []), StorageError);
});

test("completed runs are newest first with the latest answer time", async () => {
    const backend = new MemoryBackend();
    await backend.insertRevision(revision);
    await backend.insertRun(run("r1"));
    await backend.insertRun(run("r2"));
    await backend.insertRun(run("r3"));
    await backend.insertAnswer(answer("r1", "q1", "2026-01-02T00:00:00.000Z"));
    await backend.insertAnswer(answer("r1", "q2", "2026-01-03T00:00:00.000Z"));
    await backend.insertAnswer(answer("r3", "q1", "2026-01-04T00:00:00.000Z"));

    const summaries = await backend.listCompletedRuns(OWNER);

    assert.deepEqual(summaries.map((s) => s.runId), ["r3", "r1"]);
    assert.equal(summaries[1].completedAt, "2026-01-03T00:00:00.000Z");
    assert.equal(summaries[1].score, 0);
    assert.equal(summaries[1].threshold, 60);
});

test("insertAnswer reports a duplicate for the same run and question", async () => {
    const backend = new MemoryBackend();

    assert.equal(await backend.insertAnswer(answer("r1", "q1", "2026-01-02T00:00:00.000Z")), "inserted");
    assert.equal(await backend.insertAnswer(answer("r1", "q1", "2026-01-03T00:00:00.000Z")), "duplicate");
    assert.equal(await backend.insertAnswer(answer("r2", "q1", "2026-01-03T00:00:00.000Z")), "inserted");
});

test("separate instances never share state", async () => {
    const first = new MemoryBackend();
    const second = new MemoryBackend();
    await first.insertRevision(revision);

    assert.deepEqual(await second.listRevisions(OWNER), []);
});
