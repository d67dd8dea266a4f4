// config/storage.ts
import env from './env';

export const PDF_MIME_TYPE = 'application/pdf';

export const storageConfig = {
    temp: {
        dir: env.TEMP_DIR,
    },

    upload: {
        fieldName: 'files',
        maxFiles: env.MAX_UPLOAD_FILES,
        maxFileSize: env.MAX_FILE_SIZE_MB * 1024 * 1024,
        allowedMimeTypes: [PDF_MIME_TYPE],
    },
};
