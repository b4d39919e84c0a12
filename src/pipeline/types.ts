import type { TaskCategory } from '../routing/types.js';
import type { TemplateVars } from './template.js';

/**
 * Stage rendered from a prompt template and sent to a routed backend
 */
export interface GenerateStage {
  kind: 'generate';
  name: string;
  /** Category requested from the classifier; size still wins */
  categoryHint?: TaskCategory;
  /** Template with `{input}` (previous output) and caller variables */
  promptTemplate: string;
  systemInstruction?: string;
  temperature?: number;
  maxOutputTokens?: number;
  /** Per-stage limit; falls back to the executor default */
  timeoutMs?: number;
}

/**
 * Local post-processing step; never touches a backend
 */
export interface TransformStage {
  kind: 'transform';
  name: string;
  transform: (input: string, vars: TemplateVars) => string | Promise<string>;
}

export type StageDescriptor = GenerateStage | TransformStage;

export interface ExecutionRecord {
  stageIndex: number;
  stageName: string;
  /** null for transform stages and for failures before a backend was chosen */
  backendId: string | null;
  category: TaskCategory | null;
  estimatedTokens: number;
  /** Characters sent to the stage (rendered prompt or transform input) */
  inputSize: number;
  output: string | null;
  success: boolean;
  errorDetail: string | null;
  startTime: string;
  endTime: string;
}

export type RunStatus = 'completed' | 'failed' | 'cancelled';

export interface PipelineRun {
  runId: string;
  pipelineName: string;
  status: RunStatus;
  /** Stages configured for the run */
  stageCount: number;
  /** Successful records followed by the failing one, if any */
  records: ExecutionRecord[];
  /** Output of the last stage when completed */
  output: string | null;
  /** 0-based index of the failing stage */
  failedStageIndex: number | null;
  startedAt: string;
  completedAt: string;
  durationMs: number;
}

/**
 * Pipeline definition as stored in config/pipelines/*.json
 */
export interface PipelineDefinition {
  name: string;
  description?: string;
  stages: GenerateStage[];
}
