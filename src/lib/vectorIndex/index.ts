// lib/vectorIndex/index.ts
import type { VectorIndexFactory } from '../../types/vectorIndex';
import { MemoryVectorIndex } from './memoryVectorIndex';

export const createVectorIndex: VectorIndexFactory = () => new MemoryVectorIndex();

export { MemoryVectorIndex } from './memoryVectorIndex';
