// ============================================================
// Storage backend contract
// Two implementations (Postgres, in-process) with identical
// scoping and cascade behavior. Backends filter by the OwnerKey
// they are handed; product rules live in StorageAdapter.
// ============================================================

import type { OwnerKey, UserIdentity } from "@/lib/access/scope";
import type {
    Answer,
    Question,
    QuestionFlag,
    Revision,
    Run,
    RunSummary,
} from "@/lib/schemas/quiz";

export type BackendKind = "postgres" | "memory";

export type InsertAnswerOutcome = "inserted" | "duplicate";

export interface StorageBackend {
    readonly kind: BackendKind;

    ensureUser(user: UserIdentity): Promise<void>;

    insertRevision(revision: Revision): Promise<Revision>;
    listRevisions(owner: OwnerKey): Promise<Revision[]>;
    findRevision(owner: OwnerKey, id: string): Promise<Revision | null>;
    /** Deletes the revision and, transitively, its runs, questions, answers and flags. */
    deleteRevision(owner: OwnerKey, id: string): Promise<boolean>;

    insertRun(run: Run): Promise<Run>;
    findRun(owner: OwnerKey, id: string): Promise<Run | null>;
    listRuns(owner: OwnerKey, revisionId: string): Promise<Run[]>;

    /** Atomic: readers see the old batch or the new one, never a mix or nothing. */
    replaceQuestions(runId: string, questions: Question[]): Promise<void>;
    listQuestions(runId: string): Promise<Question[]>;

    insertAnswer(answer: Answer): Promise<InsertAnswerOutcome>;
    listAnswers(runId: string): Promise<Answer[]>;

    listCompletedRuns(owner: OwnerKey): Promise<RunSummary[]>;

    insertFlag(flag: QuestionFlag): Promise<QuestionFlag>;
    listFlags(runId: string): Promise<QuestionFlag[]>;
}

export class StorageError extends Error {
    constructor(
        message: string,
        public readonly code: "QUERY_FAILED" | "INVALID_ROW",
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = "StorageError";
    }
}
