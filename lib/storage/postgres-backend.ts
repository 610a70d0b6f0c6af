// ============================================================
// Postgres storage backend (node-postgres)
// Every owned-row query filters on exactly one owner column.
// Rows are validated with zod before they leave this module.
// ============================================================

import { readFileSync } from "node:fs";
import { z } from "zod/v4";
import { userEmail, type OwnerKey, type UserIdentity } from "@/lib/access/scope";
import { withTransaction, type DbClient, type DbPool } from "@/lib/db";
import {
    FlagTypeSchema,
    QuestionStyleSchema,
    RunStatusSchema,
    ScoreSchema,
    type Answer,
    type Question,
    type QuestionFlag,
    type Revision,
    type Run,
    type RunSummary,
} from "@/lib/schemas/quiz";
import { accuracyFromCounts } from "@/lib/quiz/summary";
import {
    StorageError,
    type InsertAnswerOutcome,
    type StorageBackend,
} from "./types";

const MIGRATION_URL = new URL("./migrations/0001_init.sql", import.meta.url);

// --- Row schemas ----------------------------------------------

const timestamp = z.date().transform((d) => d.toISOString());

const RevisionRowSchema = z
    .object({
        id: z.string(),
        user_id: z.string().nullable(),
        session_id: z.string().nullable(),
        name: z.string(),
        subject: z.string(),
        topics: z.array(z.string()),
        description: z.string().nullable(),
        desired_question_count: z.number().int(),
        accuracy_threshold: z.number().int(),
        question_style: QuestionStyleSchema,
        uploaded_files: z.array(z.string()).nullable(),
        extracted_texts: z.record(z.string(), z.string()),
        created_at: timestamp,
    })
    .transform((row): Revision => ({
        id: row.id,
        userId: row.user_id,
        sessionId: row.session_id,
        name: row.name,
        subject: row.subject,
        topics: row.topics,
        description: row.description,
        desiredQuestionCount: row.desired_question_count,
        accuracyThreshold: row.accuracy_threshold,
        questionStyle: row.question_style,
        uploadedFiles: row.uploaded_files,
        extractedTexts: row.extracted_texts,
        createdAt: row.created_at,
    }));

const RunRowSchema = z
    .object({
        id: z.string(),
        user_id: z.string().nullable(),
        session_id: z.string().nullable(),
        revision_id: z.string(),
        status: RunStatusSchema,
        created_at: timestamp,
    })
    .transform((row): Run => ({
        id: row.id,
        userId: row.user_id,
        sessionId: row.session_id,
        revisionId: row.revision_id,
        status: row.status,
        createdAt: row.created_at,
    }));

const QuestionRowSchema = z
    .object({
        id: z.string(),
        question_text: z.string(),
        question_index: z.number().int(),
        question_style: QuestionStyleSchema,
        options: z.array(z.string()).nullable(),
        correct_answer_index: z.number().int().nullable(),
        rationale: z.string().nullable(),
    })
    .transform((row): Question => ({
        id: row.id,
        text: row.question_text,
        ordinal: row.question_index,
        questionStyle: row.question_style,
        options: row.options,
        correctAnswerIndex: row.correct_answer_index,
        rationale: row.rationale,
    }));

const AnswerRowSchema = z
    .object({
        id: z.string(),
        run_id: z.string(),
        question_id: z.string(),
        student_answer: z.string(),
        is_correct: z.boolean(),
        score: ScoreSchema,
        correct_answer: z.string(),
        explanation: z.string().nullable(),
        error: z.string().nullable(),
        created_at: timestamp,
    })
    .transform((row): Answer => ({
        id: row.id,
        runId: row.run_id,
        questionId: row.question_id,
        studentAnswer: row.student_answer,
        score: row.score,
        isCorrect: row.is_correct,
        correctAnswer: row.correct_answer,
        explanation: row.explanation,
        error: row.error,
        createdAt: row.created_at,
    }));

const FlagRowSchema = z
    .object({
        id: z.string(),
        run_id: z.string(),
        question_id: z.string(),
        flag_type: FlagTypeSchema,
        user_id: z.string().nullable(),
        session_id: z.string().nullable(),
        trace_id: z.string().nullable(),
        created_at: timestamp,
    })
    .transform((row): QuestionFlag => ({
        id: row.id,
        runId: row.run_id,
        questionId: row.question_id,
        flagType: row.flag_type,
        userId: row.user_id,
        sessionId: row.session_id,
        traceId: row.trace_id,
        createdAt: row.created_at,
    }));

const CompletedRunRowSchema = z.object({
    run_id: z.string(),
    revision_id: z.string(),
    revision_name: z.string(),
    subject: z.string(),
    accuracy_threshold: z.number().int(),
    full_marks: z.number().int(),
    partial_marks: z.number().int(),
    incorrect: z.number().int(),
    completed_at: timestamp,
});

// --- SQL ------------------------------------------------------

const REVISION_COLUMNS = `id, user_id, session_id, name, subject, topics, description,
    desired_question_count, accuracy_threshold, question_style, uploaded_files,
    extracted_texts, created_at`;

const RUN_COLUMNS = "id, user_id, session_id, revision_id, status, created_at";

const QUESTION_COLUMNS = `id, question_text, question_index, question_style, options,
    correct_answer_index, rationale`;

const ANSWER_COLUMNS = `id, run_id, question_id, student_answer, is_correct, score,
    correct_answer, explanation, error, created_at`;

const FLAG_COLUMNS = "id, run_id, question_id, flag_type, user_id, session_id, trace_id, created_at";

// jsonb parameters are sent as JSON text; pg would encode a JS array
// as a Postgres array literal otherwise.
function jsonb(value: unknown): string | null {
    return value === null ? null : JSON.stringify(value);
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function loadSchemaSql(): string {
    return readFileSync(MIGRATION_URL, "utf8");
}

export class PostgresBackend implements StorageBackend {
    readonly kind = "postgres" as const;

    constructor(private readonly pool: DbPool) {}

    async ensureSchema(): Promise<void> {
        await this.query("ensureSchema", loadSchemaSql());
    }

    private async query(
        label: string,
        text: string,
        values: unknown[] = [],
        client: DbClient = this.pool
    ) {
        try {
            return await client.query(text, values);
        } catch (error) {
            console.error(`[storage/pg] ${label} failed:`, describeError(error));
            throw new StorageError(`${label} failed`, "QUERY_FAILED", { cause: error });
        }
    }

    private parseRows<S extends z.ZodType>(
        label: string,
        schema: S,
        rows: unknown[]
    ): Array<z.output<S>> {
        return rows.map((row) => {
            const parsed = schema.safeParse(row);
            if (!parsed.success) {
                console.error(`[storage/pg] ${label} returned an invalid row:`, parsed.error.message);
                throw new StorageError(`${label} returned an invalid row`, "INVALID_ROW");
            }
            return parsed.data;
        });
    }

    async ensureUser(user: UserIdentity): Promise<void> {
        await this.query(
            "ensureUser",
            `INSERT INTO users (id, email, name) VALUES ($1, $2, $3)
             ON CONFLICT DO NOTHING`,
            [user.userId, userEmail(user), user.name ?? null]
        );
    }

    // --- Revisions --------------------------------------------

    async insertRevision(revision: Revision): Promise<Revision> {
        const result = await this.query(
            "insertRevision",
            `INSERT INTO revisions (${REVISION_COLUMNS})
             VALUES ($1, $2, $3, $4, $5, $6::jsonb, $7, $8, $9, $10, $11::jsonb, $12::jsonb, $13::timestamptz)
             RETURNING ${REVISION_COLUMNS}`,
            [
                revision.id,
                revision.userId,
                revision.sessionId,
                revision.name,
                revision.subject,
                jsonb(revision.topics),
                revision.description,
                revision.desiredQuestionCount,
                revision.accuracyThreshold,
                revision.questionStyle,
                jsonb(revision.uploadedFiles),
                jsonb(revision.extractedTexts),
                revision.createdAt,
            ]
        );
        const [row] = this.parseRows("insertRevision", RevisionRowSchema, result.rows);
        if (!row) {
            throw new StorageError("insertRevision returned no row", "INVALID_ROW");
        }
        return row;
    }

    async listRevisions(owner: OwnerKey): Promise<Revision[]> {
        const result = await this.query(
            "listRevisions",
            `SELECT ${REVISION_COLUMNS} FROM revisions
             WHERE ${owner.column} = $1
             ORDER BY created_at ASC`,
            [owner.value]
        );
        return this.parseRows("listRevisions", RevisionRowSchema, result.rows);
    }

    async findRevision(owner: OwnerKey, id: string): Promise<Revision | null> {
        const result = await this.query(
            "findRevision",
            `SELECT ${REVISION_COLUMNS} FROM revisions
             WHERE id = $1 AND ${owner.column} = $2`,
            [id, owner.value]
        );
        const [row] = this.parseRows("findRevision", RevisionRowSchema, result.rows);
        return row ?? null;
    }

    async deleteRevision(owner: OwnerKey, id: string): Promise<boolean> {
        // Runs, questions, answers and flags go with it via ON DELETE CASCADE.
        const result = await this.query(
            "deleteRevision",
            `DELETE FROM revisions WHERE id = $1 AND ${owner.column} = $2`,
            [id, owner.value]
        );
        return (result.rowCount ?? 0) > 0;
    }

    // --- Runs -------------------------------------------------

    async insertRun(run: Run): Promise<Run> {
        const result = await this.query(
            "insertRun",
            `INSERT INTO revision_runs (${RUN_COLUMNS})
             VALUES ($1, $2, $3, $4, $5, $6::timestamptz)
             RETURNING ${RUN_COLUMNS}`,
            [run.id, run.userId, run.sessionId, run.revisionId, run.status, run.createdAt]
        );
        const [row] = this.parseRows("insertRun", RunRowSchema, result.rows);
        if (!row) {
            throw new StorageError("insertRun returned no row", "INVALID_ROW");
        }
        return row;
    }

    async findRun(owner: OwnerKey, id: string): Promise<Run | null> {
        const result = await this.query(
            "findRun",
            `SELECT ${RUN_COLUMNS} FROM revision_runs
             WHERE id = $1 AND ${owner.column} = $2`,
            [id, owner.value]
        );
        const [row] = this.parseRows("findRun", RunRowSchema, result.rows);
        return row ?? null;
    }

    async listRuns(owner: OwnerKey, revisionId: string): Promise<Run[]> {
        const result = await this.query(
            "listRuns",
            `SELECT ${RUN_COLUMNS} FROM revision_runs
             WHERE revision_id = $1 AND ${owner.column} = $2
             ORDER BY created_at ASC`,
            [revisionId, owner.value]
        );
        return this.parseRows("listRuns", RunRowSchema, result.rows);
    }

    // --- Questions --------------------------------------------

    async replaceQuestions(runId: string, questions: Question[]): Promise<void> {
        try {
            await withTransaction(this.pool, async (client) => {
                await this.query(
                    "replaceQuestions.delete",
                    "DELETE FROM run_questions WHERE run_id = $1",
                    [runId],
                    client
                );
                for (const question of questions) {
                    await this.query(
                        "replaceQuestions.insert",
                        `INSERT INTO run_questions (${QUESTION_COLUMNS}, run_id)
                         VALUES ($1, $2, $3, $4, $5::jsonb, $6, $7, $8)`,
                        [
                            question.id,
                            question.text,
                            question.ordinal,
                            question.questionStyle,
                            jsonb(question.options),
                            question.correctAnswerIndex,
                            question.rationale,
                            runId,
                        ],
                        client
                    );
                }
            });
        } catch (error) {
            if (error instanceof StorageError) {
                throw error;
            }
            console.error("[storage/pg] replaceQuestions transaction failed:", describeError(error));
            throw new StorageError("replaceQuestions failed", "QUERY_FAILED", { cause: error });
        }
    }

    async listQuestions(runId: string): Promise<Question[]> {
        const result = await this.query(
            "listQuestions",
            `SELECT ${QUESTION_COLUMNS} FROM run_questions
             WHERE run_id = $1
             ORDER BY question_index ASC`,
            [runId]
        );
        return this.parseRows("listQuestions", QuestionRowSchema, result.rows);
    }

    // --- Answers ----------------------------------------------

    async insertAnswer(answer: Answer): Promise<InsertAnswerOutcome> {
        const result = await this.query(
            "insertAnswer",
            `INSERT INTO run_answers (${ANSWER_COLUMNS})
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10::timestamptz)
             ON CONFLICT (run_id, question_id) DO NOTHING`,
            [
                answer.id,
                answer.runId,
                answer.questionId,
                answer.studentAnswer,
                answer.isCorrect,
                answer.score,
                answer.correctAnswer,
                answer.explanation,
                answer.error,
                answer.createdAt,
            ]
        );
        return (result.rowCount ?? 0) > 0 ? "inserted" : "duplicate";
    }

    async listAnswers(runId: string): Promise<Answer[]> {
        const result = await this.query(
            "listAnswers",
            `SELECT ${ANSWER_COLUMNS} FROM run_answers
             WHERE run_id = $1
             ORDER BY seq ASC`,
            [runId]
        );
        return this.parseRows("listAnswers", AnswerRowSchema, result.rows);
    }

    async listCompletedRuns(owner: OwnerKey): Promise<RunSummary[]> {
        const result = await this.query(
            "listCompletedRuns",
            `SELECT r.id AS run_id,
                    v.id AS revision_id,
                    v.name AS revision_name,
                    v.subject,
                    v.accuracy_threshold,
                    COUNT(*) FILTER (WHERE a.score = 'Full Marks')::int AS full_marks,
                    COUNT(*) FILTER (WHERE a.score = 'Partial Marks')::int AS partial_marks,
                    COUNT(*) FILTER (WHERE a.score NOT IN ('Full Marks', 'Partial Marks'))::int AS incorrect,
                    MAX(a.created_at) AS completed_at
             FROM revision_runs r
             JOIN revisions v ON v.id = r.revision_id
             JOIN run_answers a ON a.run_id = r.id
             WHERE r.${owner.column} = $1
             GROUP BY r.id, r.created_at, v.id
             ORDER BY r.created_at DESC`,
            [owner.value]
        );
        return this.parseRows("listCompletedRuns", CompletedRunRowSchema, result.rows).map(
            (row) => {
                const counts = {
                    fullMarks: row.full_marks,
                    partialMarks: row.partial_marks,
                    incorrect: row.incorrect,
                };
                return {
                    runId: row.run_id,
                    revisionId: row.revision_id,
                    revisionName: row.revision_name,
                    subject: row.subject,
                    completedAt: row.completed_at,
                    score: accuracyFromCounts(counts),
                    totalQuestions: counts.fullMarks + counts.partialMarks + counts.incorrect,
                    threshold: row.accuracy_threshold,
                };
            }
        );
    }

    // --- Flags ------------------------------------------------

    async insertFlag(flag: QuestionFlag): Promise<QuestionFlag> {
        const result = await this.query(
            "insertFlag",
            `INSERT INTO question_flags (${FLAG_COLUMNS})
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8::timestamptz)
             RETURNING ${FLAG_COLUMNS}`,
            [
                flag.id,
                flag.runId,
                flag.questionId,
                flag.flagType,
                flag.userId,
                flag.sessionId,
                flag.traceId,
                flag.createdAt,
            ]
        );
        const [row] = this.parseRows("insertFlag", FlagRowSchema, result.rows);
        if (!row) {
            throw new StorageError("insertFlag returned no row", "INVALID_ROW");
        }
        return row;
    }

    async listFlags(runId: string): Promise<QuestionFlag[]> {
        const result = await this.query(
            "listFlags",
            `SELECT ${FLAG_COLUMNS} FROM question_flags
             WHERE run_id = $1
             ORDER BY seq ASC`,
            [runId]
        );
        return this.parseRows("listFlags", FlagRowSchema, result.rows);
    }
}
