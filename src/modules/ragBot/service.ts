// modules/ragBot/service.ts
import { randomUUID } from 'crypto';
import type { Document } from '../../types/document';
import type { TextEmbedder } from '../../types/embedding';
import type {
    VectorIndex,
    VectorIndexFactory,
    VectorSearch,
} from '../../types/vectorIndex';
import type {
    AnswerSource,
    AskResult,
    ConversationHistory,
    ProcessResult,
} from '../../types/conversation';
import {
    EmptyQuestionError,
    OperationTimeoutError,
    SessionRebuildingError,
} from '../../types/errors';
import { pipelineConfig } from '../../config/pipeline';
import { DocumentIngestor } from '../../lib/ingestion/documentIngestor';
import { ChunkingService } from '../../lib/chunking/chunkingService';
import { Retriever } from '../../lib/rag/retriever';
import { QueryRewriter } from '../../lib/rag/queryRewriter';
import { AnswerSynthesizer } from '../../lib/rag/answerSynthesizer';
import { SessionStore, type SessionStatus } from '../../lib/session/sessionStore';
import { getEmbeddingService } from '../../lib/ai/embeddingService';
import { getLLMService } from '../../lib/ai/LLMService';
import { createVectorIndex } from '../../lib/vectorIndex';
import { getParser } from '../../lib/parsers';
import { tempFileStorage } from '../../lib/storage';
import { withTimeout } from '../../lib/timeout';
import { ddl } from '../../lib/dd';

export type QuestionDuringRebuildPolicy = 'wait' | 'reject';

export interface DocQueryServiceOptions {
    questionDuringRebuild: QuestionDuringRebuildPolicy;
    ingestionTimeoutMs: number;
    questionTimeoutMs: number;
}

export interface DocQueryServiceDeps {
    ingestor: DocumentIngestor;
    chunker: ChunkingService;
    embedder: TextEmbedder;
    createIndex: VectorIndexFactory;
    retriever: Retriever;
    synthesizer: AnswerSynthesizer;
    sessions: SessionStore;
    options: DocQueryServiceOptions;
}

interface BuiltSession {
    index: VectorIndex;
    result: ProcessResult;
}

/**
 * Process PDFs into a fresh session and answer questions against it.
 * Rebuilds and questions share one FIFO lock held by the session store.
 */
export class DocQueryService {
    constructor(private readonly deps: DocQueryServiceDeps) {}

    async processDocuments(documents: Document[]): Promise<ProcessResult> {
        const { sessions, options } = this.deps;

        return sessions.runExclusive(async () => {
            sessions.beginRebuild();
            const controller = new AbortController();

            try {
                const built = await withTimeout(
                    this.build(documents, controller.signal),
                    options.ingestionTimeoutMs,
                    'document processing',
                    controller
                );

                // The commit is not subject to the deadline
                await sessions.replaceSession(
                    built.index,
                    built.result.filenames,
                    built.result.sessionId
                );

                return built.result;
            } finally {
                sessions.endRebuild();
            }
        });
    }

    async askQuestion(
        question: string,
        chatHistory: ConversationHistory = []
    ): Promise<AskResult> {
        const { sessions, options } = this.deps;
        const trimmed = question.trim();

        if (!trimmed) {
            throw new EmptyQuestionError();
        }

        if (options.questionDuringRebuild === 'reject' && sessions.isRebuilding) {
            throw new SessionRebuildingError();
        }

        return sessions.runExclusive(async () => {
            sessions.requireSession();
            const history =
                chatHistory.length > 0 ? chatHistory : sessions.getHistory();
            const result = await withTimeout(
                this.answer(sessions, trimmed, history),
                options.questionTimeoutMs,
                'question'
            );

            // Only a complete answer becomes part of the transcript
            sessions.appendTurn('user', trimmed);
            sessions.appendTurn('assistant', result.answer);

            return result;
        });
    }

    getStatus(): SessionStatus {
        return this.deps.sessions.getStatus();
    }

    async resetConversation(): Promise<void> {
        const { sessions } = this.deps;
        await sessions.runExclusive(async () => sessions.resetHistory());
    }

    /**
     * Ingest, chunk, embed and index into a new index that is not yet active.
     * A build abandoned by the deadline disposes its own index.
     */
    private async build(
        documents: Document[],
        signal: AbortSignal
    ): Promise<BuiltSession> {
        const { ingestor, chunker, embedder, createIndex } = this.deps;

        const { segments, filenames } = await ingestor.ingest(documents);
        const { chunks } = chunker.chunk(segments);
        const vectors = await embedder.embedBatch(
            chunks.map((chunk) => chunk.content)
        );
        this.throwIfAbandoned(signal);

        const sessionId = randomUUID();
        const index = createIndex(sessionId);

        try {
            await index.insert(chunks, vectors);
            this.throwIfAbandoned(signal);
        } catch (error) {
            await this.disposeQuietly(index);
            throw error;
        }

        ddl(
            `[DocQueryService] built ${sessionId}: ${filenames.length} files, ${segments.length} segments, ${chunks.length} chunks`
        );

        return {
            index,
            result: {
                sessionId,
                filenames,
                segmentCount: segments.length,
                chunkCount: chunks.length,
            },
        };
    }

    private throwIfAbandoned(signal: AbortSignal): void {
        if (signal.aborted) {
            throw new OperationTimeoutError(
                'document processing',
                this.deps.options.ingestionTimeoutMs
            );
        }
    }

    private async answer(
        search: VectorSearch,
        question: string,
        history: ConversationHistory
    ): Promise<AskResult> {
        const { retriever, synthesizer } = this.deps;

        const { searchQuery, chunks } = await retriever.retrieve(
            search,
            question,
            history
        );
        const answer = await synthesizer.synthesize(question, history, chunks);

        const sources: AnswerSource[] = chunks.map(({ chunk, score }) => ({
            filename: chunk.sourceFilename,
            pageNumber: chunk.pageNumber,
            chunkIndex: chunk.chunkIndex,
            score,
        }));

        return { answer, searchQuery, sources };
    }

    private async disposeQuietly(index: VectorIndex): Promise<void> {
        try {
            await index.dispose();
        } catch (error) {
            console.error('[DocQueryService] Failed to dispose partial index:', error);
        }
    }
}

export function createDocQueryService(): DocQueryService {
    const llm = getLLMService();
    const embedder = getEmbeddingService();

    return new DocQueryService({
        ingestor: new DocumentIngestor(getParser('pdf'), tempFileStorage),
        chunker: new ChunkingService(pipelineConfig.chunking),
        embedder,
        createIndex: createVectorIndex,
        retriever: new Retriever(new QueryRewriter(llm), embedder, {
            k: pipelineConfig.retrieval.k,
            fallbackToQuestion: pipelineConfig.retrieval.fallbackToQuestion,
        }),
        synthesizer: new AnswerSynthesizer(llm, {
            maxContextTokens: pipelineConfig.synthesis.maxContextTokens,
            maxHistoryTokens: pipelineConfig.synthesis.maxHistoryTokens,
        }),
        sessions: new SessionStore(),
        options: {
            questionDuringRebuild: pipelineConfig.session.questionDuringRebuild,
            ingestionTimeoutMs: pipelineConfig.timeouts.ingestionMs,
            questionTimeoutMs: pipelineConfig.timeouts.questionMs,
        },
    });
}

let defaultService: DocQueryService | null = null;

export function getDocQueryService(): DocQueryService {
    if (!defaultService) {
        defaultService = createDocQueryService();
    }
    return defaultService;
}
