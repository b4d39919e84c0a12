import { DocumentSegmenter, wholeDocumentFragment } from '../document/DocumentSegmenter.js';
import type { ParsedDocument } from '../document/types.js';
import { summarizeExpertise } from '../reporting/summary.js';
import type { RunSummary } from '../reporting/summary.js';
import type { BackendRegistry } from '../routing/BackendRegistry.js';
import { createLogger } from '../utils/logger.js';
import { ExpertAnalysisOrchestrator } from './ExpertAnalysisOrchestrator.js';
import type { OrchestratorOptions } from './ExpertAnalysisOrchestrator.js';
import type { AnalysisStage, ExpertiseRun, ExpertiseRunOptions } from './types.js';

const logger = createLogger('LegalExpertiseService');

/**
 * A located document, as returned by a retrieval service
 */
export interface RetrievedDocument {
  title: string;
  text: string;
  metadata: Record<string, unknown>;
}

/**
 * Document retrieval collaborator (registry lookup, URL fetch, file store)
 *
 * Failures are passed through to the caller unchanged.
 */
export interface DocumentSource {
  fetch(identifier: string): Promise<RetrievedDocument>;
}

export interface ExpertiseResult {
  title: string | null;
  parsed: ParsedDocument;
  /** True when no structure was found and the whole text was analysed as one unit */
  wholeDocument: boolean;
  run: ExpertiseRun;
  summary: RunSummary;
}

export interface LegalExpertiseServiceOptions {
  segmenter?: DocumentSegmenter;
  orchestrator?: OrchestratorOptions;
  /** Stages to run (default: config/expertise-stages.json) */
  stages?: readonly AnalysisStage[];
}

/**
 * Legal Expertise Service
 *
 * Wires segmentation, completeness tracking and the stage matrix into one
 * call per document.
 */
export class LegalExpertiseService {
  private readonly segmenter: DocumentSegmenter;
  private readonly orchestrator: ExpertAnalysisOrchestrator;
  private readonly stages?: readonly AnalysisStage[];

  constructor(registry: BackendRegistry, options: LegalExpertiseServiceOptions = {}) {
    this.segmenter = options.segmenter ?? new DocumentSegmenter();
    this.orchestrator = new ExpertAnalysisOrchestrator(registry, options.orchestrator);
    this.stages = options.stages;
  }

  async analyzeDocument(text: string, options: ExpertiseRunOptions = {}, title: string | null = null): Promise<ExpertiseResult> {
    const parsed = this.segmenter.parse(text);
    const wholeDocument = parsed.fragments.length === 0;

    if (wholeDocument) {
      logger.warn('No structure recognised, analysing the whole document as one unit', {
        length: text.length,
      });
    }

    const fragments = wholeDocument ? [wholeDocumentFragment(text, title)] : parsed.fragments;
    // The synthetic unit is unnumbered but must still count toward completeness
    const run = await this.orchestrator.run(
      fragments,
      this.stages,
      wholeDocument ? { ...options, countUnnumbered: true } : options
    );

    return {
      title,
      parsed,
      wholeDocument,
      run,
      summary: summarizeExpertise(run),
    };
  }

  async analyzeFromSource(
    source: DocumentSource,
    identifier: string,
    options: ExpertiseRunOptions = {}
  ): Promise<ExpertiseResult> {
    const document = await source.fetch(identifier);
    logger.info('Document retrieved', { identifier, title: document.title, length: document.text.length });
    return this.analyzeDocument(document.text, options, document.title);
  }
}
