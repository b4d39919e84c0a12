export { DocumentSegmenter, PREAMBLE_NUMBER, computeStats, tableOfContents, wholeDocumentFragment } from './document/DocumentSegmenter.js';
export type { SegmenterOptions } from './document/DocumentSegmenter.js';
export { fragmentPath } from './document/fragmentPath.js';
export { compareNumbers } from './document/naturalSort.js';
export type * from './document/types.js';

export { CompletenessTracker } from './expertise/CompletenessTracker.js';
export type {
  ChecklistEntry,
  CompletenessReport,
  CompletenessTrackerOptions,
  EntryOutcome,
  MarkResult,
  ValidatedReport,
} from './expertise/CompletenessTracker.js';
export { ExpertAnalysisOrchestrator } from './expertise/ExpertAnalysisOrchestrator.js';
export type { OrchestratorOptions } from './expertise/ExpertAnalysisOrchestrator.js';
export { LegalExpertiseService } from './expertise/LegalExpertiseService.js';
export type {
  DocumentSource,
  ExpertiseResult,
  LegalExpertiseServiceOptions,
  RetrievedDocument,
} from './expertise/LegalExpertiseService.js';
export { ANALYSIS_VARIABLES, loadExpertiseStages, validateAnalysisStages } from './expertise/stages.js';
export type * from './expertise/types.js';

export { TaskClassifier } from './routing/TaskClassifier.js';
export { BackendRegistry } from './routing/BackendRegistry.js';
export type { RegisteredBackend } from './routing/BackendRegistry.js';
export { BackendRouter } from './routing/BackendRouter.js';
export { RoutedInvoker } from './routing/RoutedInvoker.js';
export type { RoutedCall, RoutedResult } from './routing/RoutedInvoker.js';
export { TASK_CATEGORIES, safeContextTokens } from './routing/types.js';
export type * from './routing/types.js';

export type { InvocationOptions, LanguageModelBackend } from './backends/Backend.js';
export { AnthropicBackend } from './backends/AnthropicBackend.js';
export { OpenAIBackend } from './backends/OpenAIBackend.js';
export type { OpenAIBackendOptions } from './backends/OpenAIBackend.js';
export { GeminiBackend } from './backends/GeminiBackend.js';
export { createBackendRegistry } from './backends/createBackendRegistry.js';
export type { BackendRegistryOptions } from './backends/createBackendRegistry.js';

export { StageExecutor } from './pipeline/StageExecutor.js';
export type { ExecuteOptions, StageExecutorOptions } from './pipeline/StageExecutor.js';
export { RunHistory } from './pipeline/RunHistory.js';
export { renderTemplate, templateVariables } from './pipeline/template.js';
export type { TemplateVars } from './pipeline/template.js';
export type * from './pipeline/types.js';

export { loadBackendTable, parseBackendTable } from './config/backends.js';
export type { BackendTable } from './config/backends.js';
export { loadClassificationConfig, parseClassificationConfig } from './config/classification.js';
export type { ClassificationConfig } from './config/classification.js';
export { loadPipeline, PIPELINE_PRESETS } from './config/pipelines.js';
export type { PipelinePreset } from './config/pipelines.js';

export { couldNotRun, summarizeExpertise, summarizePipelineRun } from './reporting/summary.js';
export type { RunOutcome, RunSummary } from './reporting/summary.js';

export * from './utils/errors.js';
