// ============================================================
// In-process storage backend
// Used when no durable store is configured or reachable.
// Same scoping and cascade rules as the Postgres backend; state
// belongs to the instance, so its lifetime is its owner's.
// ============================================================

import { ownsRow, userEmail, type OwnerKey, type UserIdentity } from "@/lib/access/scope";
import type {
    Answer,
    Question,
    QuestionFlag,
    Revision,
    Run,
    RunSummary,
} from "@/lib/schemas/quiz";
import { accuracyFromCounts, countTiers } from "@/lib/quiz/summary";
import {
    StorageError,
    type InsertAnswerOutcome,
    type StorageBackend,
} from "./types";

interface StoredUser {
    id: string;
    email: string;
    name: string | null;
}

export class MemoryBackend implements StorageBackend {
    readonly kind = "memory" as const;

    private readonly users = new Map<string, StoredUser>();
    private readonly revisions = new Map<string, Revision>();
    private readonly runs = new Map<string, Run>();
    private readonly questions = new Map<string, Question[]>();
    private readonly answers = new Map<string, Answer[]>();
    private readonly flags = new Map<string, QuestionFlag[]>();

    async ensureUser(user: UserIdentity): Promise<void> {
        if (this.users.has(user.userId)) {
            return;
        }
        this.users.set(user.userId, {
            id: user.userId,
            email: userEmail(user),
            name: user.name ?? null,
        });
    }

    // --- Revisions --------------------------------------------

    async insertRevision(revision: Revision): Promise<Revision> {
        if (this.revisions.has(revision.id)) {
            throw new StorageError(`revision ${revision.id} already exists`, "QUERY_FAILED");
        }
        this.revisions.set(revision.id, structuredClone(revision));
        return structuredClone(revision);
    }

    async listRevisions(owner: OwnerKey): Promise<Revision[]> {
        return [...this.revisions.values()]
            .filter((revision) => ownsRow(owner, revision))
            .map((revision) => structuredClone(revision));
    }

    async findRevision(owner: OwnerKey, id: string): Promise<Revision | null> {
        const revision = this.revisions.get(id);
        return revision && ownsRow(owner, revision) ? structuredClone(revision) : null;
    }

    async deleteRevision(owner: OwnerKey, id: string): Promise<boolean> {
        const revision = this.revisions.get(id);
        if (!revision || !ownsRow(owner, revision)) {
            return false;
        }
        this.revisions.delete(id);
        for (const run of [...this.runs.values()]) {
            if (run.revisionId === id) {
                this.dropRun(run.id);
            }
        }
        return true;
    }

    // --- Runs -------------------------------------------------

    async insertRun(run: Run): Promise<Run> {
        if (this.runs.has(run.id)) {
            throw new StorageError(`run ${run.id} already exists`, "QUERY_FAILED");
        }
        if (!this.revisions.has(run.revisionId)) {
            throw new StorageError(`revision ${run.revisionId} does not exist`, "QUERY_FAILED");
        }
        this.runs.set(run.id, structuredClone(run));
        return structuredClone(run);
    }

    async findRun(owner: OwnerKey, id: string): Promise<Run | null> {
        const run = this.runs.get(id);
        return run && ownsRow(owner, run) ? structuredClone(run) : null;
    }

    async listRuns(owner: OwnerKey, revisionId: string): Promise<Run[]> {
        return [...this.runs.values()]
            .filter((run) => run.revisionId === revisionId && ownsRow(owner, run))
            .map((run) => structuredClone(run));
    }

    private dropRun(runId: string): void {
        this.runs.delete(runId);
        this.questions.delete(runId);
        this.answers.delete(runId);
        this.flags.delete(runId);
    }

    // --- Questions --------------------------------------------

    async replaceQuestions(runId: string, questions: Question[]): Promise<void> {
        if (!this.runs.has(runId)) {
            throw new StorageError(`run ${runId} does not exist`, "QUERY_FAILED");
        }
        // Single assignment: readers never observe an empty batch.
        this.questions.set(runId, structuredClone(questions));
        // Dropping the old questions drops what referenced them.
        this.answers.delete(runId);
        this.flags.delete(runId);
    }

    async listQuestions(runId: string): Promise<Question[]> {
        const questions = this.questions.get(runId) ?? [];
        return structuredClone(questions).sort((a, b) => a.ordinal - b.ordinal);
    }

    // --- Answers ----------------------------------------------

    async insertAnswer(answer: Answer): Promise<InsertAnswerOutcome> {
        const existing = this.answers.get(answer.runId) ?? [];
        if (existing.some((a) => a.questionId === answer.questionId)) {
            return "duplicate";
        }
        this.answers.set(answer.runId, [...existing, structuredClone(answer)]);
        return "inserted";
    }

    async listAnswers(runId: string): Promise<Answer[]> {
        return structuredClone(this.answers.get(runId) ?? []);
    }

    async listCompletedRuns(owner: OwnerKey): Promise<RunSummary[]> {
        const summaries: RunSummary[] = [];
        // Newest first, matching ORDER BY created_at DESC.
        for (const run of [...this.runs.values()].reverse()) {
            if (!ownsRow(owner, run)) {
                continue;
            }
            const answers = this.answers.get(run.id) ?? [];
            const revision = this.revisions.get(run.revisionId);
            if (answers.length === 0 || !revision) {
                continue;
            }
            summaries.push({
                runId: run.id,
                revisionId: revision.id,
                revisionName: revision.name,
                subject: revision.subject,
                completedAt: latestCreatedAt(answers),
                score: accuracyFromCounts(countTiers(answers)),
                totalQuestions: answers.length,
                threshold: revision.accuracyThreshold,
            });
        }
        return summaries;
    }

    // --- Flags ------------------------------------------------

    async insertFlag(flag: QuestionFlag): Promise<QuestionFlag> {
        const existing = this.flags.get(flag.runId) ?? [];
        this.flags.set(flag.runId, [...existing, structuredClone(flag)]);
        return structuredClone(flag);
    }

    async listFlags(runId: string): Promise<QuestionFlag[]> {
        return structuredClone(this.flags.get(runId) ?? []);
    }
}

function latestCreatedAt(answers: Answer[]): string {
    return answers.reduce(
        (latest, answer) => (answer.createdAt > latest ? answer.createdAt : latest),
        answers[0].createdAt
    );
}
