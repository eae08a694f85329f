export { BaseRandomSource, SeededRandomSource } from './random-source.js';
export { FixedRandomSource } from './fixed-random-source.js';
export type { RandomSource, Seed } from './random-source.js';
