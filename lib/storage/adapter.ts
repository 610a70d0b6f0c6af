// ============================================================
// StorageAdapter: single CRUD surface for revisions, runs,
// questions, answers and flags, scoped to one caller identity.
//
// Rules applied here, whatever the backend:
// - every read/write is keyed by user_id (authenticated) or
//   session_id (anonymous), never both
// - rows owned by someone else read as not-found
// - deleting revisions and completed-run history need a user
// ============================================================

import { randomUUID } from "node:crypto";
import {
    describeIdentity,
    isAuthenticated,
    ownerColumns,
    ownerKey,
    type Identity,
    type OwnerKey,
} from "@/lib/access/scope";
import {
    AnswerInputSchema,
    FlagInputSchema,
    RevisionInputSchema,
    RunInputSchema,
    isFullMarks,
    questionBatchFor,
    type Answer,
    type AnswerInput,
    type FlagInput,
    type Question,
    type QuestionFlag,
    type Revision,
    type RevisionInput,
    type Run,
    type RunInput,
    type RunStatus,
    type RunSummary,
} from "@/lib/schemas/quiz";
import {
    deriveRunStatus,
    nextQuestion,
    summarizeRun,
    type RunResult,
} from "@/lib/quiz/summary";
import type { BackendKind, StorageBackend } from "./types";

export type MutationFailureCode = "NOT_FOUND" | "CONFLICT";

export type MutationResult<T> =
    | { ok: true; data: T }
    | { ok: false; code: MutationFailureCode; message: string };

export interface StorageAdapterOptions {
    now?: () => Date;
    newId?: () => string;
}

function notFound<T>(message: string): MutationResult<T> {
    return { ok: false, code: "NOT_FOUND", message };
}

export class StorageAdapter {
    private readonly owner: OwnerKey;
    private readonly now: () => Date;
    private readonly newId: () => string;

    constructor(
        private readonly backend: StorageBackend,
        readonly identity: Identity,
        options: StorageAdapterOptions = {}
    ) {
        this.owner = ownerKey(identity);
        this.now = options.now ?? (() => new Date());
        this.newId = options.newId ?? randomUUID;
    }

    get backendKind(): BackendKind {
        return this.backend.kind;
    }

    get isAuthenticated(): boolean {
        return isAuthenticated(this.identity);
    }

    private timestamp(): string {
        return this.now().toISOString();
    }

    private async ensureUserExists(): Promise<void> {
        if (isAuthenticated(this.identity)) {
            await this.backend.ensureUser(this.identity);
        }
    }

    // --- Revisions --------------------------------------------

    /** Throws ZodError on invalid input. */
    async createRevision(input: RevisionInput): Promise<Revision> {
        const data = RevisionInputSchema.parse(input);
        await this.ensureUserExists();

        const revision = await this.backend.insertRevision({
            ...ownerColumns(this.identity),
            id: data.id ?? this.newId(),
            name: data.name,
            subject: data.subject,
            topics: data.topics,
            description: data.description,
            desiredQuestionCount: data.desiredQuestionCount,
            accuracyThreshold: data.accuracyThreshold,
            questionStyle: data.questionStyle,
            uploadedFiles: data.uploadedFiles,
            extractedTexts: data.extractedTexts,
            createdAt: this.timestamp(),
        });
        console.info(`[storage] created revision ${revision.id} for ${describeIdentity(this.identity)}`);
        return revision;
    }

    async listRevisions(): Promise<Revision[]> {
        return this.backend.listRevisions(this.owner);
    }

    async getRevision(id: string): Promise<Revision | null> {
        return this.backend.findRevision(this.owner, id);
    }

    /**
     * Anonymous callers can never delete, not even revisions stamped
     * with their own session id.
     */
    async deleteRevision(id: string): Promise<boolean> {
        if (!isAuthenticated(this.identity)) {
            console.warn(`[storage] anonymous delete of revision ${id} refused`);
            return false;
        }
        const deleted = await this.backend.deleteRevision(this.owner, id);
        if (!deleted) {
            console.warn(`[storage] revision ${id} not found for ${describeIdentity(this.identity)}`);
        }
        return deleted;
    }

    // --- Runs -------------------------------------------------

    /**
     * The run is stamped with the caller's identity, not copied from the
     * revision. Returns null when the revision is not visible to the caller.
     */
    async createRun(input: RunInput): Promise<Run | null> {
        const data = RunInputSchema.parse(input);
        const revision = await this.backend.findRevision(this.owner, data.revisionId);
        if (!revision) {
            return null;
        }
        await this.ensureUserExists();

        return this.backend.insertRun({
            ...ownerColumns(this.identity),
            id: data.id ?? this.newId(),
            revisionId: revision.id,
            status: "running",
            createdAt: this.timestamp(),
        });
    }

    async getRun(id: string): Promise<Run | null> {
        return this.backend.findRun(this.owner, id);
    }

    async listRunsForRevision(revisionId: string): Promise<Run[]> {
        const revision = await this.backend.findRevision(this.owner, revisionId);
        return revision ? this.backend.listRuns(this.owner, revisionId) : [];
    }

    // --- Questions --------------------------------------------

    /**
     * Replaces the run's whole question batch in one step. Answers and
     * flags tied to the previous batch go with it. Throws ZodError on an
     * invalid batch, including ids minted for another run; returns false
     * when the run is not visible.
     */
    async storeQuestions(runId: string, questions: Question[]): Promise<boolean> {
        const batch = questionBatchFor(runId).parse(questions);
        const run = await this.backend.findRun(this.owner, runId);
        if (!run) {
            return false;
        }
        await this.backend.replaceQuestions(run.id, batch);
        console.info(`[storage] stored ${batch.length} questions for run ${run.id}`);
        return true;
    }

    async getQuestions(runId: string): Promise<Question[]> {
        const run = await this.backend.findRun(this.owner, runId);
        return run ? this.backend.listQuestions(run.id) : [];
    }

    // --- Answers ----------------------------------------------

    /** Throws ZodError on invalid input. */
    async storeAnswer(runId: string, input: AnswerInput): Promise<MutationResult<Answer>> {
        const data = AnswerInputSchema.parse(input);
        const run = await this.backend.findRun(this.owner, runId);
        if (!run) {
            return notFound("Run not found");
        }
        const questions = await this.backend.listQuestions(run.id);
        if (!questions.some((q) => q.id === data.questionId)) {
            return notFound("Question not found in this run");
        }

        const answer: Answer = {
            id: this.newId(),
            runId: run.id,
            questionId: data.questionId,
            studentAnswer: data.studentAnswer,
            score: data.score,
            isCorrect: isFullMarks(data.score),
            correctAnswer: data.correctAnswer,
            explanation: data.explanation,
            error: data.error,
            createdAt: this.timestamp(),
        };
        const outcome = await this.backend.insertAnswer(answer);
        if (outcome === "duplicate") {
            return {
                ok: false,
                code: "CONFLICT",
                message: "Question already answered in this run",
            };
        }
        return { ok: true, data: answer };
    }

    async getAnswers(runId: string): Promise<Answer[]> {
        const run = await this.backend.findRun(this.owner, runId);
        return run ? this.backend.listAnswers(run.id) : [];
    }

    // --- Progress ---------------------------------------------

    async getNextQuestion(runId: string): Promise<Question | null> {
        const run = await this.backend.findRun(this.owner, runId);
        if (!run) {
            return null;
        }
        const [questions, answers] = await Promise.all([
            this.backend.listQuestions(run.id),
            this.backend.listAnswers(run.id),
        ]);
        return nextQuestion(questions, answers);
    }

    async getRunStatus(runId: string): Promise<RunStatus | null> {
        const run = await this.backend.findRun(this.owner, runId);
        if (!run) {
            return null;
        }
        const [questions, answers] = await Promise.all([
            this.backend.listQuestions(run.id),
            this.backend.listAnswers(run.id),
        ]);
        return deriveRunStatus(questions, answers);
    }

    async getRunResult(runId: string): Promise<RunResult | null> {
        const run = await this.backend.findRun(this.owner, runId);
        if (!run) {
            return null;
        }
        return summarizeRun(run, await this.backend.listAnswers(run.id));
    }

    /** History needs a durable identity: anonymous callers always get []. */
    async listCompletedRuns(): Promise<RunSummary[]> {
        if (!isAuthenticated(this.identity)) {
            return [];
        }
        return this.backend.listCompletedRuns(this.owner);
    }

    // --- Flags ------------------------------------------------

    /** Throws ZodError on invalid input. */
    async flagQuestion(runId: string, input: FlagInput): Promise<MutationResult<QuestionFlag>> {
        const data = FlagInputSchema.parse(input);
        const run = await this.backend.findRun(this.owner, runId);
        if (!run) {
            return notFound("Run not found");
        }
        const questions = await this.backend.listQuestions(run.id);
        if (!questions.some((q) => q.id === data.questionId)) {
            return notFound("Question not found in this run");
        }
        await this.ensureUserExists();

        const flag = await this.backend.insertFlag({
            ...ownerColumns(this.identity),
            id: this.newId(),
            runId: run.id,
            questionId: data.questionId,
            flagType: data.flagType,
            traceId: data.traceId,
            createdAt: this.timestamp(),
        });
        return { ok: true, data: flag };
    }

    async getQuestionFlags(runId: string): Promise<QuestionFlag[]> {
        const run = await this.backend.findRun(this.owner, runId);
        return run ? this.backend.listFlags(run.id) : [];
    }
}
