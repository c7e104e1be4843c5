export * from './council/types.js';
export * from './council/extractionRules.js';
export { AnswerExtractor } from './council/AnswerExtractor.js';
export { PromptRenderer, renderTemplate } from './council/PromptRenderer.js';
export type { PromptTemplates, TemplateVariables } from './council/PromptRenderer.js';
export { AdvisorPanel } from './council/AdvisorPanel.js';
export { DecisionArbiter, MISSING_RESPONSE_PLACEHOLDER, isCorrectAnswer } from './council/DecisionArbiter.js';
export { QuestionProcessor } from './council/QuestionProcessor.js';
export type { QuestionProcessorOptions, ImageCheckFn } from './council/QuestionProcessor.js';
export {
  StatisticsAggregator,
  classifyConsensus,
  CONSENSUS_BUCKETS,
  DEFAULT_DIFFICULT_LIMIT,
} from './council/StatisticsAggregator.js';
export { CouncilRunner, selectQuestions } from './council/CouncilRunner.js';
export type { RunParameters, RunSummary, SelectionOptions, CouncilRunnerOptions } from './council/CouncilRunner.js';

export * from './image-processor/types.js';
export { VisionBackendFactory, resolveApiKey } from './image-processor/VisionBackendFactory.js';
export { validateImage, DEFAULT_MAX_IMAGE_SIZE_MB } from './image-processor/imageValidator.js';
export type { ImageCheck } from './image-processor/imageValidator.js';
export { CloudVisionError } from './image-processor/providers/BaseCloudVisionProvider.js';

export { loadQuestions, parseQuestionRows } from './dataset/DatasetLoader.js';
export { RunStore, loadResults, lastCompletedId } from './runs/RunStore.js';
export type { RunMetadata, RunOptions, SkipRecord } from './runs/RunStore.js';
export { renderSummaryMarkdown, renderCategoryCsv, writeReports } from './runs/ReportRenderer.js';
export { reextractResults } from './runs/reextract.js';

export { ConfigLoader } from './config/ConfigLoader.js';
export { validateCouncilConfig, selectAdvisors, overrideDecisionModel } from './config/CouncilConfig.js';
export type { CouncilConfig } from './config/CouncilConfig.js';
export { ConfigurationError, DatasetError } from './config/errors.js';
export { logger, setLogLevel } from './utils/logger.js';
