export * from './shared-interfaces.js';
export { analyzePrompt } from './analysis/prompt-analyzer.js';
export * from './analysis/text-stats.js';
export * from './analysis/comparison.js';
export * from './storage/store.js';
export {
  createJsonStores,
  JsonEvaluationStore,
  JsonPromptStore,
} from './storage/json-file-store.js';
export {
  createSqlStores,
  SqlEvaluationStore,
  SqlPromptStore,
  type SqlStores,
} from './storage/sql-store.js';
export { migrateJsonToSql } from './storage/sql-migration.js';
export { createStores } from './storage/store-creation.js';
export {
  type AppConfig,
  loadAppConfig,
} from './configuration/app-config.js';
export * from './configuration/prompt-templating.js';
export * from './configuration/authoring-aids.js';
export * from './orchestration/evaluation-service.js';
export * from './orchestration/review-queue.js';
export {
  authorPrompt,
  seedDefaultPrompts,
  setPromptResponse,
} from './orchestration/prompt-library.js';
export * from './ratings/rating-types.js';
export {
  calculateEvaluationStats,
  type EvaluationStats,
  type ScoreBucket,
} from './ratings/stats.js';
export * from './reporting/charts.js';
export {
  buildAnalysisReport,
  writeAnalysisReport,
} from './reporting/analysis-report.js';
export {
  type ResponseGenerator,
  generateMissingResponse,
} from './generation/response-generator.js';
export { HuggingFaceResponseGenerator } from './generation/hf-response-generator.js';
export * from './utils/errors.js';
