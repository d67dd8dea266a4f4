// config/pipeline.ts
import env from './env';

export const pipelineConfig = {
    chunking: {
        maxChunkSize: env.CHUNK_SIZE,
        overlapSize: env.CHUNK_OVERLAP,
    },

    retrieval: {
        k: env.RETRIEVAL_K,
        fallbackToQuestion: env.REWRITE_FALLBACK_TO_QUESTION,
    },

    synthesis: {
        maxContextTokens: env.MAX_CONTEXT_TOKENS,
        maxHistoryTokens: env.MAX_HISTORY_TOKENS,
    },

    session: {
        questionDuringRebuild: env.QUESTION_DURING_REBUILD,
    },

    // Whole-operation budgets, independent of the per-request provider timeouts
    timeouts: {
        ingestionMs: env.INGESTION_TIMEOUT_MS,
        questionMs: env.QUESTION_TIMEOUT_MS,
    },
};
