import type { Fragment, FragmentType } from '../document/types.js';
import { createLogger } from '../utils/logger.js';

/**
 * Completeness Tracker
 *
 * Keeps one checklist entry per trackable fragment and answers the
 * question "was any article silently skipped?". The denominator is fixed
 * when the tracker is built; marks only ever move entries forward.
 */

const logger = createLogger('CompletenessTracker');

export type EntryOutcome = 'pending' | 'analyzed' | 'analyzed-with-errors';

export type MarkResult = 'marked' | 'duplicate' | 'unknown';

export interface ChecklistEntry<P> {
  fragmentId: string;
  analyzed: boolean;
  outcome: EntryOutcome;
  payload: P | null;
  /** ISO timestamp of the latest mark */
  timestamp: string | null;
  markCount: number;
}

export interface CompletenessReport {
  total: number;
  analyzed: number;
  missingIds: string[];
  /** Fraction in [0, 1]; an empty checklist counts as complete */
  percentage: number;
  analyzedWithErrorsIds: string[];
  duplicateMarks: number;
  isComplete: boolean;
}

export interface ValidatedReport extends CompletenessReport {
  recommendation: string;
}

export interface CompletenessTrackerOptions<P> {
  /** Fragment types that enter the checklist (default: articles) */
  trackableTypes?: FragmentType[];
  /** Count pseudo-numbered units such as the preamble (default: false) */
  countUnnumbered?: boolean;
  /** Invoked when an already analyzed fragment is marked again */
  onDuplicateMark?: (entry: Readonly<ChecklistEntry<P>>) => void;
}

export class CompletenessTracker<P = unknown> {
  private readonly tracked: Fragment[];
  private readonly checklist: Map<string, ChecklistEntry<P>> = new Map();
  private readonly onDuplicateMark?: (entry: Readonly<ChecklistEntry<P>>) => void;
  private duplicateMarks = 0;
  private analyzedCount = 0;

  constructor(fragments: Fragment[], options: CompletenessTrackerOptions<P> = {}) {
    const trackableTypes = options.trackableTypes ?? ['article'];
    const countUnnumbered = options.countUnnumbered ?? false;

    this.tracked = fragments.filter(
      (fragment) =>
        trackableTypes.includes(fragment.type) && (countUnnumbered || fragment.numbered)
    );
    this.onDuplicateMark = options.onDuplicateMark;

    for (const fragment of this.tracked) {
      this.checklist.set(fragment.id, {
        fragmentId: fragment.id,
        analyzed: false,
        outcome: 'pending',
        payload: null,
        timestamp: null,
        markCount: 0,
      });
    }

    logger.info('Checklist created', {
      trackableTypes,
      total: this.checklist.size,
      excluded: fragments.length - this.tracked.length,
    });
  }

  /**
   * Fragments that enter the checklist, in document order
   */
  trackableFragments(): Fragment[] {
    return [...this.tracked];
  }

  has(fragmentId: string): boolean {
    return this.checklist.has(fragmentId);
  }

  /**
   * Record a fragment as analyzed
   *
   * Repeat marks overwrite the payload and outcome, raise the duplicate
   * signal and leave `analyzed` true. Unknown ids change nothing.
   */
  mark(fragmentId: string, payload: P, outcome: Exclude<EntryOutcome, 'pending'> = 'analyzed'): MarkResult {
    const entry = this.checklist.get(fragmentId);

    if (!entry) {
      logger.warn('Attempt to mark a fragment outside the checklist', { fragmentId });
      return 'unknown';
    }

    const duplicate = entry.analyzed;

    if (!duplicate) {
      this.analyzedCount++;
    }
    entry.analyzed = true;
    entry.outcome = outcome;
    entry.payload = payload;
    entry.timestamp = new Date().toISOString();
    entry.markCount++;

    if (duplicate) {
      this.duplicateMarks++;
      logger.warn('Fragment marked more than once', {
        fragmentId,
        markCount: entry.markCount,
      });
      this.onDuplicateMark?.({ ...entry });
      return 'duplicate';
    }

    logger.debug('Fragment marked', { fragmentId, outcome });
    return 'marked';
  }

  isComplete(): boolean {
    return this.analyzedCount === this.checklist.size;
  }

  /**
   * Ids not yet marked, in original document order
   */
  missing(): string[] {
    return this.tracked
      .filter((fragment) => !this.checklist.get(fragment.id)?.analyzed)
      .map((fragment) => fragment.id);
  }

  entry(fragmentId: string): Readonly<ChecklistEntry<P>> | undefined {
    const entry = this.checklist.get(fragmentId);
    return entry ? { ...entry } : undefined;
  }

  entries(): Array<Readonly<ChecklistEntry<P>>> {
    return this.tracked.map((fragment) => {
      const entry = this.checklist.get(fragment.id);
      if (!entry) {
        throw new Error(`Checklist entry missing for ${fragment.id}`);
      }
      return { ...entry };
    });
  }

  report(): CompletenessReport {
    const total = this.checklist.size;
    const missingIds = this.missing();
    const analyzedWithErrorsIds = this.tracked
      .filter((fragment) => this.checklist.get(fragment.id)?.outcome === 'analyzed-with-errors')
      .map((fragment) => fragment.id);

    return {
      total,
      analyzed: this.analyzedCount,
      missingIds,
      percentage: total === 0 ? 1 : this.analyzedCount / total,
      analyzedWithErrorsIds,
      duplicateMarks: this.duplicateMarks,
      isComplete: missingIds.length === 0,
    };
  }

  /**
   * Report plus a recommendation, logged at error level when incomplete
   */
  validateAndReport(): ValidatedReport {
    const report = this.report();

    if (!report.isComplete) {
      logger.error('Analysis incomplete', {
        missing: report.missingIds.length,
        missingIds: report.missingIds,
      });
      return {
        ...report,
        recommendation:
          `Analysis incomplete: ${report.missingIds.length} of ${report.total} fragments were not analyzed ` +
          `(${report.missingIds.join(', ')}). Re-run the expertise for the missing fragments.`,
      };
    }

    if (report.analyzedWithErrorsIds.length > 0) {
      logger.warn('Analysis complete with errors', {
        analyzedWithErrors: report.analyzedWithErrorsIds.length,
      });
      return {
        ...report,
        recommendation:
          `All ${report.total} fragments were visited; ${report.analyzedWithErrorsIds.length} have failed stages ` +
          `(${report.analyzedWithErrorsIds.join(', ')}).`,
      };
    }

    logger.info('Analysis complete', { total: report.total });
    return {
      ...report,
      recommendation: `All ${report.total} fragments were analyzed.`,
    };
  }

  /**
   * Checklist rendered as text, for inclusion in analysis prompts
   */
  checklistText(): string {
    const lines = ['=== COMPLETENESS CHECKLIST ===', ''];
    let currentChapter: string | null = null;

    for (const fragment of this.tracked) {
      if (fragment.parentNumber && fragment.parentNumber !== currentChapter && fragment.type === 'article') {
        currentChapter = fragment.parentNumber;
        lines.push(`Chapter ${currentChapter}:`);
      }

      const status = this.checklist.get(fragment.id)?.analyzed ? '[x]' : '[ ]';
      const label = fragment.type === 'paragraph' ? 'Paragraph' : fragment.type === 'chapter' ? 'Chapter' : 'Article';
      const title = fragment.title ? `: ${fragment.title}` : '';
      lines.push(`${status} ${label} ${fragment.number}${title}`);
    }

    const report = this.report();
    lines.push('');
    lines.push(`Total: ${report.total}`);
    lines.push(`Analyzed: ${report.analyzed}`);
    lines.push(`Completion: ${(report.percentage * 100).toFixed(1)}%`);

    return lines.join('\n');
  }
}
