/**
 * Structural fragment types of an NPA document
 */

export type FragmentType = 'chapter' | 'article' | 'paragraph';

/**
 * A structurally identified unit of a document.
 *
 * `number` is a display token (e.g. "15", "15-1", "7.2", "IV"), never an
 * integer sequence. `parentNumber` is a weak back-reference to the enclosing
 * chapter or article.
 */
export interface Fragment {
  readonly id: string;
  readonly type: FragmentType;
  readonly number: string;
  readonly numbered: boolean;
  readonly title: string | null;
  readonly text: string;
  readonly parentNumber: string | null;
  readonly charStart: number;
  readonly charEnd: number;
}

export type SegmentationWarningKind = 'no-structure' | 'duplicate-number' | 'unnumbered-article';

export interface SegmentationWarning {
  kind: SegmentationWarningKind;
  message: string;
  fragmentId?: string;
}

export interface SegmentationStats {
  total: number;
  chapters: number;
  articles: number;
  paragraphs: number;
  articleNumbers: string[];
}

export interface ParsedDocument {
  fragments: Fragment[];
  warnings: SegmentationWarning[];
  stats: SegmentationStats;
}
