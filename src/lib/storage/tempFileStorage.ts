// lib/storage/tempFileStorage.ts
import fs from 'fs/promises';
import path from 'path';
import crypto from 'crypto';
import { ddl } from '../dd';

export interface ITempFileStorage {
    write(buffer: Buffer, extension: string): Promise<string>;
    delete(filePath: string): Promise<void>;
    withTempFile<T>(
        buffer: Buffer,
        extension: string,
        task: (filePath: string) => Promise<T>
    ): Promise<T>;
}

const errorCode = (error: unknown): string | undefined =>
    error instanceof Error && 'code' in error && typeof error.code === 'string'
        ? error.code
        : undefined;

/**
 * Short-lived files for extractors that want a path instead of bytes.
 */
export class TempFileStorage implements ITempFileStorage {
    constructor(private readonly baseDir: string) {}

    private async ensureBaseDir(): Promise<void> {
        await fs.mkdir(this.baseDir, { recursive: true });
    }

    async write(buffer: Buffer, extension: string): Promise<string> {
        await this.ensureBaseDir();

        // Generate unique filename
        const timestamp = Date.now();
        const randomStr = crypto.randomBytes(8).toString('hex');
        const fullPath = path.join(
            this.baseDir,
            `${timestamp}-${randomStr}${extension}`
        );

        await fs.writeFile(fullPath, buffer);
        ddl('temp file written ->', fullPath);

        return fullPath;
    }

    async delete(filePath: string): Promise<void> {
        try {
            await fs.unlink(filePath);
        } catch (error) {
            if (errorCode(error) !== 'ENOENT') {
                throw error;
            }
        }
    }

    /**
     * Write the buffer, hand its path to `task`, and remove the file
     * whether the task resolves or throws.
     */
    async withTempFile<T>(
        buffer: Buffer,
        extension: string,
        task: (filePath: string) => Promise<T>
    ): Promise<T> {
        const filePath = await this.write(buffer, extension);
        try {
            return await task(filePath);
        } finally {
            await this.delete(filePath);
            ddl('temp file removed ->', filePath);
        }
    }
}
