// lib/storage/index.ts
import { storageConfig } from '../../config/storage';
import { TempFileStorage } from './tempFileStorage';

export const tempFileStorage = new TempFileStorage(storageConfig.temp.dir);

export { TempFileStorage };
export type { ITempFileStorage } from './tempFileStorage';
