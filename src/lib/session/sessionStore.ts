// lib/session/sessionStore.ts
import { randomUUID } from 'crypto';
import type { Embedding, ScoredChunk } from '../../types/document';
import type { VectorIndex, VectorSearch } from '../../types/vectorIndex';
import type {
    ConversationHistory,
    ConversationRole,
} from '../../types/conversation';
import { NoActiveSessionError } from '../../types/errors';
import { ddl } from '../dd';

export type SessionState = 'uninitialized' | 'active';

export interface SessionHandle {
    readonly id: string;
    readonly filenames: readonly string[];
    readonly createdAt: Date;
}

interface ActiveSession {
    handle: SessionHandle;
    index: VectorIndex;
}

export interface SessionStatus {
    state: SessionState;
    isRebuilding: boolean;
    sessionId: string | null;
    filenames: string[];
    chunkCount: number;
    turnCount: number;
}

/**
 * Holds the single active session: its index, the documents it was built
 * from and the conversation transcript. The index never leaves the store;
 * searches go through `query`. Rebuilds and questions are run one at a
 * time, in arrival order, through `runExclusive`.
 */
export class SessionStore implements VectorSearch {
    private active: ActiveSession | null = null;
    private history: ConversationHistory = [];
    private rebuilding = false;
    private tail: Promise<void> = Promise.resolve();

    /**
     * Run `task` after every previously queued task has settled
     */
    runExclusive<T>(task: () => Promise<T>): Promise<T> {
        const result = this.tail.then(task);
        this.tail = result.then(
            () => undefined,
            () => undefined
        );
        return result;
    }

    beginRebuild(): void {
        this.rebuilding = true;
    }

    endRebuild(): void {
        this.rebuilding = false;
    }

    get isRebuilding(): boolean {
        return this.rebuilding;
    }

    /**
     * Install a freshly built index and clear the transcript. The new
     * session is active before the previous index is disposed; a dispose
     * failure is only logged.
     */
    async replaceSession(
        index: VectorIndex,
        filenames: string[],
        id: string = randomUUID()
    ): Promise<SessionHandle> {
        const previous = this.active;
        const handle: SessionHandle = {
            id,
            filenames: [...filenames],
            createdAt: new Date(),
        };

        this.active = { handle, index };
        this.history = [];

        ddl(`[SessionStore] session ${id} active with ${filenames.length} documents`);

        if (previous && previous.index !== index) {
            try {
                await previous.index.dispose();
            } catch (error) {
                console.error(
                    `[SessionStore] Failed to dispose index of session ${previous.handle.id}:`,
                    error
                );
            }
        }

        return handle;
    }

    currentSession(): SessionHandle | null {
        return this.active?.handle ?? null;
    }

    requireSession(): SessionHandle {
        return this.requireActive().handle;
    }

    async query(vector: Embedding, k: number): Promise<ScoredChunk[]> {
        return this.requireActive().index.query(vector, k);
    }

    appendTurn(role: ConversationRole, content: string): void {
        this.requireSession();
        this.history.push({ role, content });
    }

    getHistory(): ConversationHistory {
        return this.history.map((turn) => ({ ...turn }));
    }

    resetHistory(): void {
        this.requireSession();
        this.history = [];
    }

    getState(): SessionState {
        return this.active ? 'active' : 'uninitialized';
    }

    getStatus(): SessionStatus {
        return {
            state: this.getState(),
            isRebuilding: this.rebuilding,
            sessionId: this.active?.handle.id ?? null,
            filenames: this.active ? [...this.active.handle.filenames] : [],
            chunkCount: this.active?.index.size ?? 0,
            turnCount: this.history.length,
        };
    }

    private requireActive(): ActiveSession {
        if (!this.active) {
            throw new NoActiveSessionError();
        }
        return this.active;
    }
}
