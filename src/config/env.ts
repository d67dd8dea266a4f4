import { z } from 'zod';
import dotenv from 'dotenv';
import os from 'os';
import path from 'path';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

const booleanFlag = z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true');

export const envSchema = z
    .object({
        PORT: z.coerce.number().int().positive().default(8000),
        NODE_ENV: z
            .enum(['development', 'production', 'test'])
            .default('development'),
        CORS_ORIGIN: z.string().default('http://localhost:8501'),

        ENABLE_LOGS: z.string().default('true'),

        // Gemini
        GOOGLE_GEMINI_API_KEY: z.string().default(''),
        GOOGLE_API_BASE_URL: z
            .string()
            .url()
            .default('https://generativelanguage.googleapis.com/v1beta'),
        GOOGLE_GEMINI_LLM_MODEL: z.string().default('gemini-2.5-flash'),
        GOOGLE_EMBEDDING_MODEL: z.string().default('text-embedding-004'),
        LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.5),
        LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
        EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
        PROVIDER_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
        EMBEDDING_CACHE: booleanFlag,
        EMBEDDING_CACHE_SIZE: z.coerce.number().int().positive().default(5000),

        // Pipeline
        CHUNK_SIZE: z.coerce.number().int().positive().default(1500),
        CHUNK_OVERLAP: z.coerce.number().int().min(0).default(150),
        RETRIEVAL_K: z.coerce.number().int().positive().default(5),
        MAX_CONTEXT_TOKENS: z.coerce.number().int().positive().default(4000),
        MAX_HISTORY_TOKENS: z.coerce.number().int().positive().default(2000),
        REWRITE_FALLBACK_TO_QUESTION: booleanFlag,
        QUESTION_DURING_REBUILD: z.enum(['wait', 'reject']).default('wait'),
        INGESTION_TIMEOUT_MS: z.coerce
            .number()
            .int()
            .positive()
            .default(300000),
        QUESTION_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),

        // Uploads
        TEMP_DIR: z.string().default(path.join(os.tmpdir(), 'docquery')),
        MAX_UPLOAD_FILES: z.coerce.number().int().positive().default(10),
        MAX_FILE_SIZE_MB: z.coerce.number().positive().default(50),
    })
    .superRefine((value, ctx) => {
        if (!value.GOOGLE_GEMINI_API_KEY.trim()) {
            ctx.addIssue({
                code: 'custom',
                path: ['GOOGLE_GEMINI_API_KEY'],
                message: 'GOOGLE_GEMINI_API_KEY is required',
            });
        }

        if (value.CHUNK_OVERLAP >= value.CHUNK_SIZE) {
            ctx.addIssue({
                code: 'custom',
                path: ['CHUNK_OVERLAP'],
                message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
            });
        }
    });

export type Env = z.infer<typeof envSchema>;

/**
 * Parse configuration from an environment map.
 * Throws a ZodError when a required credential is missing, so the process
 * stops before it starts listening.
 */
export function loadEnv(source: NodeJS.ProcessEnv): Env {
    return envSchema.parse(source);
}

const env = loadEnv(process.env);

export default env;
