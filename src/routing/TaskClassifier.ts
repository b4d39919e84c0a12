import { loadClassificationConfig } from '../config/classification.js';
import type { ClassificationConfig } from '../config/classification.js';
import type { Script, TaskCategory, TaskClassification } from './types.js';

/**
 * Task Classifier
 *
 * Pure function of (primary text, auxiliary context, hint): estimates the
 * token count from a per-script characters-per-token ratio and buckets the
 * task. Thresholds and keyword sets come from configuration.
 *
 * Priority: large-document > hint > reasoning > quick > general
 */

const CYRILLIC = /\p{Script=Cyrillic}/gu;

function bounded(source: string): RegExp {
  return new RegExp(`(?<![\\p{L}\\d])(?:${source})(?![\\p{L}\\d])`, 'iu');
}

function keywordPattern(keyword: string): RegExp {
  return bounded(keyword.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));
}

export class TaskClassifier {
  private readonly config: ClassificationConfig;
  private readonly reasoning: Array<{ keyword: string; pattern: RegExp }>;
  private readonly quick: Array<{ source: string; pattern: RegExp }>;

  constructor(config: ClassificationConfig = loadClassificationConfig()) {
    this.config = config;
    this.reasoning = config.reasoningKeywords.map((keyword) => ({
      keyword,
      pattern: keywordPattern(keyword),
    }));
    this.quick = config.quickPatterns.map((source) => ({ source, pattern: bounded(source) }));
  }

  /**
   * Classify one task
   *
   * @param primaryText The prompt or fragment text; keywords are matched here only
   * @param auxiliaryContext Extra material counted toward the size estimate
   * @param hint Category requested by the caller, honoured unless the task is oversized
   */
  classify(primaryText: string, auxiliaryContext?: string, hint?: TaskCategory): TaskClassification {
    const combined = auxiliaryContext ? `${primaryText}\n${auxiliaryContext}` : primaryText;
    const script = this.detectScript(combined);
    const estimatedTokens = this.estimateTokens(combined, script);

    if (estimatedTokens > this.config.largeDocumentTokens) {
      return {
        estimatedTokens,
        script,
        category: 'large-document',
        rationale: `Estimated ${estimatedTokens} tokens exceeds ${this.config.largeDocumentTokens}`,
      };
    }

    if (hint) {
      return {
        estimatedTokens,
        script,
        category: hint,
        rationale: `Caller hint "${hint}" (${estimatedTokens} tokens)`,
      };
    }

    const keyword = this.reasoning.find(({ pattern }) => pattern.test(primaryText));
    if (keyword) {
      return {
        estimatedTokens,
        script,
        category: 'reasoning',
        rationale: `Reasoning keyword "${keyword.keyword}" matched`,
      };
    }

    if (estimatedTokens <= this.config.quickMaxTokens) {
      const quick = this.quick.find(({ pattern }) => pattern.test(primaryText));
      if (quick) {
        return {
          estimatedTokens,
          script,
          category: 'quick',
          rationale: `Short task (${estimatedTokens} tokens) matching /${quick.source}/`,
        };
      }
    }

    return {
      estimatedTokens,
      script,
      category: 'general',
      rationale: `No category rule matched (${estimatedTokens} tokens)`,
    };
  }

  /**
   * Token estimate for a text, using the ratio of its dominant script
   */
  estimateTokens(text: string, script: Script = this.detectScript(text)): number {
    if (text.length === 0) {
      return 0;
    }
    const ratio = script === 'cyrillic' ? this.config.cyrillicCharsPerToken : this.config.latinCharsPerToken;
    return Math.ceil(text.length / ratio);
  }

  detectScript(text: string): Script {
    if (text.length === 0) {
      return 'latin';
    }
    const cyrillic = text.match(CYRILLIC)?.length ?? 0;
    return cyrillic / text.length > this.config.cyrillicShare ? 'cyrillic' : 'latin';
  }
}
