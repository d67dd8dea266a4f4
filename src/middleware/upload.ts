// middlewares/upload.ts
import multer from 'multer';
import type { Request } from 'express';
import { storageConfig } from '../config/storage';
import { UnsupportedFormatError } from '../types/errors';

// Use memory storage to get buffer for processing
const storage = multer.memoryStorage();

// One wrong type rejects the whole request before any file reaches the ingestor
const fileFilter = (
    req: Request,
    file: Express.Multer.File,
    cb: multer.FileFilterCallback
) => {
    if (storageConfig.upload.allowedMimeTypes.includes(file.mimetype)) {
        cb(null, true);
    } else {
        cb(new UnsupportedFormatError(file.originalname, file.mimetype));
    }
};

export const uploadMiddleware = multer({
    storage,
    fileFilter,
    limits: {
        fileSize: storageConfig.upload.maxFileSize,
        files: storageConfig.upload.maxFiles,
    },
});

export const uploadDocuments = uploadMiddleware.array(
    storageConfig.upload.fieldName,
    storageConfig.upload.maxFiles
);
