import type { Fragment } from '../document/types.js';
import type { TaskCategory } from '../routing/types.js';
import type { CompletenessReport } from './CompletenessTracker.js';

/**
 * One-shot analysis of a fragment rendered from a prompt template
 *
 * Template variables: {text} {number} {title} {type} {path} {checklist}
 */
export interface PromptAnalysisStage {
  kind: 'prompt';
  name: string;
  /** Display name used in reports */
  title?: string;
  promptTemplate: string;
  systemInstruction?: string;
  categoryHint?: TaskCategory;
  temperature?: number;
  maxOutputTokens?: number;
  timeoutMs?: number;
}

export interface AnalysisContext {
  /** Breadcrumb such as "Chapter 2 → Article 5" */
  path: string;
  /** Completeness checklist as rendered at the start of the run */
  checklist: string;
  signal: AbortSignal;
}

/**
 * Analysis implemented in code (rule checks, local models, fakes)
 */
export interface CustomAnalysisStage {
  kind: 'custom';
  name: string;
  title?: string;
  analyze: (fragment: Fragment, context: AnalysisContext) => Promise<string>;
}

export type AnalysisStage = PromptAnalysisStage | CustomAnalysisStage;

/**
 * Result of one (fragment, stage) pair
 */
export interface CellResult {
  fragmentId: string;
  stageName: string;
  success: boolean;
  output: string | null;
  errorDetail: string | null;
  /** null for custom stages and failures before routing */
  backendId: string | null;
  startTime: string;
  endTime: string;
}

/**
 * Checklist payload of a fragment: its result for every requested stage
 */
export interface FragmentAnalysis {
  fragmentId: string;
  results: Record<string, CellResult>;
  hasErrors: boolean;
}

export interface StageSummary {
  stageName: string;
  title: string;
  attempted: number;
  succeeded: number;
  failed: number;
}

export interface ExpertiseProgress {
  completed: number;
  total: number;
}

export interface ExpertiseRunOptions {
  /** Stage names to leave out of this run */
  skipStages?: string[];
  /** Overrides the orchestrator's setting for pseudo-numbered units */
  countUnnumbered?: boolean;
  /** Cells analysed at the same time (default 1) */
  concurrency?: number;
  /** Unstarted cells are abandoned once this aborts */
  signal?: AbortSignal;
  /** Called, one at a time, after each fragment is marked */
  onFragmentComplete?: (
    fragment: Fragment,
    analysis: FragmentAnalysis,
    progress: ExpertiseProgress
  ) => void | Promise<void>;
}

export interface ExpertiseRun {
  runId: string;
  /** Every attempted cell, in fragment-then-stage order */
  cells: CellResult[];
  /** fragment id → stage name → result */
  matrix: Record<string, Record<string, CellResult>>;
  report: CompletenessReport;
  stageSummaries: StageSummary[];
  /** Stages requested for this run after skips */
  stageNames: string[];
  cancelled: boolean;
  /** Failures raised by onFragmentComplete, which never affect the analysis */
  callbackErrors: string[];
  startedAt: string;
  completedAt: string;
}
