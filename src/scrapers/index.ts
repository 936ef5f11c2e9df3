/**
 * scrapers/index.ts: Barrel export for page extractors.
 *
 * The walker depends only on `RecordExtractor`; `QuizPageExtractor` is the
 * default implementation for the quiz site's question page.
 */

export { BaseExtractor } from './baseExtractor';
export type { RecordExtractor } from './baseExtractor';
export { QuizPageExtractor } from './quizPageExtractor';
