import { createLogger } from '../utils/logger.js';
import type {
  Fragment,
  FragmentType,
  ParsedDocument,
  SegmentationStats,
  SegmentationWarning,
} from './types.js';

/**
 * Document Segmenter
 *
 * Splits the raw text of an NPA into chapters, articles and the paragraphs
 * nested inside articles, producing the table of contents that the
 * completeness checklist is built from.
 *
 * Headers are recognised at the start of a line or right after a sentence
 * terminator, so texts flattened onto a single line still segment:
 *   "Статья 1. Текст. Статья 2. Текст." → articles "1" and "2"
 */

const logger = createLogger('DocumentSegmenter');

export interface SegmenterOptions {
  chapterKeywords?: string[];
  articleKeywords?: string[];
  /** Emit text before the first header as an unnumbered "preamble" article */
  capturePreamble?: boolean;
  /** Recognise "1." / "1)" paragraph markers inside article bodies */
  paragraphs?: boolean;
}

const DEFAULT_CHAPTER_KEYWORDS = ['Глава', 'ГЛАВА', 'Раздел', 'РАЗДЕЛ', 'Chapter', 'CHAPTER'];
const DEFAULT_ARTICLE_KEYWORDS = ['Статья', 'СТАТЬЯ', 'Article', 'ARTICLE'];

export const PREAMBLE_NUMBER = 'preamble';

const ARTICLE_NUMBER = String.raw`\d+(?:[.\-]\d+)*(?:-?[а-яёa-zА-ЯЁA-Z])?`;
// Amended chapters keep their continuation: "3-1", "2.1"
const CHAPTER_NUMBER = String.raw`\d+(?:[.\-]\d+)*|[IVXLCDM]+`;
// Start of line (after indentation) or after ". ", "; ", ": ", "! ", "? "
const HEADER_BOUNDARY = String.raw`(?<=^[ \t]*|[.;!?:][ \t]+)`;
const NUMBER_END = String.raw`(?![\p{L}\d])`;

const PARAGRAPH_MARKER = /(?<=^[ \t]*)(\d+)([.)])[ \t]+(?=\S)/gmu;

interface HeaderMatch {
  level: 0 | 1;
  index: number;
  headerEnd: number;
  number: string | null;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function trimEnd(text: string, start: number, end: number): number {
  let trimmed = end;
  while (trimmed > start && /\s/u.test(text[trimmed - 1])) {
    trimmed--;
  }
  return trimmed;
}

function lineEnd(text: string, from: number): number {
  const newline = text.indexOf('\n', from);
  return newline === -1 ? text.length : newline;
}

export class DocumentSegmenter {
  private readonly numberedChapter: RegExp;
  private readonly numberedArticle: RegExp;
  private readonly unnumberedArticle: RegExp;
  private readonly capturePreamble: boolean;
  private readonly paragraphs: boolean;

  constructor(options: SegmenterOptions = {}) {
    const chapters = (options.chapterKeywords ?? DEFAULT_CHAPTER_KEYWORDS).map(escapeRegExp).join('|');
    const articles = (options.articleKeywords ?? DEFAULT_ARTICLE_KEYWORDS).map(escapeRegExp).join('|');

    this.numberedChapter = new RegExp(
      `${HEADER_BOUNDARY}(?:${chapters})[ \\t]+(${CHAPTER_NUMBER})${NUMBER_END}`,
      'gmu'
    );
    this.numberedArticle = new RegExp(
      `${HEADER_BOUNDARY}(?:${articles})[ \\t]+(${ARTICLE_NUMBER})${NUMBER_END}`,
      'gmu'
    );
    this.unnumberedArticle = new RegExp(`^[ \\t]*(?:${articles})\\.?[ \\t]*\\r?$`, 'gmu');
    this.capturePreamble = options.capturePreamble ?? true;
    this.paragraphs = options.paragraphs ?? true;
  }

  /**
   * Ordered fragment sequence (possibly empty)
   */
  segment(text: string): Fragment[] {
    return this.parse(text).fragments;
  }

  /**
   * Segment a document and report drafting anomalies
   *
   * Never throws: a text without recognisable headers yields no fragments
   * and a 'no-structure' warning, leaving it to the caller to treat the
   * whole text as a single unit.
   */
  parse(text: string): ParsedDocument {
    const warnings: SegmentationWarning[] = [];
    const headers = this.findHeaders(text);

    if (headers.length === 0) {
      logger.debug('No structural headers recognised', { length: text.length });
      warnings.push({
        kind: 'no-structure',
        message: 'No chapter or article headers recognised',
      });
      return { fragments: [], warnings, stats: computeStats([]) };
    }

    const ids = new IdAllocator();
    const fragments: Fragment[] = [];

    if (this.capturePreamble) {
      const preamble = this.buildPreamble(text, headers[0].index, ids);
      if (preamble) {
        fragments.push(preamble);
      }
    }

    let currentChapter: string | null = null;
    let unnumberedCount = 0;

    for (let i = 0; i < headers.length; i++) {
      const header = headers[i];
      let end = text.length;
      let nextAny = text.length;
      for (let j = i + 1; j < headers.length; j++) {
        if (j === i + 1) {
          nextAny = headers[j].index;
        }
        if (headers[j].level <= header.level) {
          end = headers[j].index;
          break;
        }
      }
      end = trimEnd(text, header.index, end);

      const type: FragmentType = header.level === 0 ? 'chapter' : 'article';
      let number = header.number;
      const numbered = number !== null;
      if (number === null) {
        unnumberedCount++;
        number = `u${unnumberedCount}`;
      }

      const { id, duplicate } = ids.allocate(type, number);
      if (duplicate) {
        const message = `Duplicate ${type} number "${number}" at offset ${header.index}`;
        logger.warn(message, { fragmentId: id });
        warnings.push({ kind: 'duplicate-number', message, fragmentId: id });
      }
      if (!numbered) {
        warnings.push({
          kind: 'unnumbered-article',
          message: `Unnumbered article at offset ${header.index} assigned pseudo-number "${number}"`,
          fragmentId: id,
        });
      }

      const headerLineEnd = lineEnd(text, header.headerEnd);
      const title = extractTitle(text, header.headerEnd, Math.min(headerLineEnd, nextAny, end));

      if (type === 'chapter') {
        currentChapter = number;
      }

      const fragment = freeze({
        id,
        type,
        number,
        numbered,
        title,
        text: text.slice(header.index, end),
        parentNumber: type === 'article' ? currentChapter : null,
        charStart: header.index,
        charEnd: end,
      });
      fragments.push(fragment);

      if (type === 'article' && this.paragraphs && headerLineEnd < end) {
        fragments.push(...this.findParagraphs(text, fragment, headerLineEnd + 1, ids));
      }
    }

    fragments.sort((a, b) => a.charStart - b.charStart || levelOf(a.type) - levelOf(b.type));
    const stats = computeStats(fragments);

    logger.info('Document segmented', {
      chapters: stats.chapters,
      articles: stats.articles,
      paragraphs: stats.paragraphs,
      warnings: warnings.length,
    });

    return { fragments, warnings, stats };
  }

  private findHeaders(text: string): HeaderMatch[] {
    const headers: HeaderMatch[] = [];

    for (const match of text.matchAll(this.numberedChapter)) {
      headers.push({
        level: 0,
        index: match.index ?? 0,
        headerEnd: (match.index ?? 0) + match[0].length,
        number: match[1],
      });
    }
    for (const match of text.matchAll(this.numberedArticle)) {
      headers.push({
        level: 1,
        index: match.index ?? 0,
        headerEnd: (match.index ?? 0) + match[0].length,
        number: match[1],
      });
    }
    for (const match of text.matchAll(this.unnumberedArticle)) {
      const raw = match[0];
      const offset = raw.length - raw.trimStart().length;
      headers.push({
        level: 1,
        index: (match.index ?? 0) + offset,
        headerEnd: (match.index ?? 0) + raw.length,
        number: null,
      });
    }

    return headers.sort((a, b) => a.index - b.index);
  }

  private buildPreamble(text: string, firstHeader: number, ids: IdAllocator): Fragment | null {
    let start = 0;
    while (start < firstHeader && /\s/u.test(text[start])) {
      start++;
    }
    const end = trimEnd(text, start, firstHeader);
    if (end <= start) {
      return null;
    }

    return freeze({
      id: ids.allocate('article', PREAMBLE_NUMBER).id,
      type: 'article',
      number: PREAMBLE_NUMBER,
      numbered: false,
      title: null,
      text: text.slice(start, end),
      parentNumber: null,
      charStart: start,
      charEnd: end,
    });
  }

  /**
   * Paragraph markers inside one article body
   *
   * The first marker's style ("1." or "1)") decides which markers count;
   * markers of the other style are treated as sub-items of a paragraph.
   */
  private findParagraphs(
    text: string,
    article: Fragment,
    bodyStart: number,
    ids: IdAllocator
  ): Fragment[] {
    const body = text.slice(bodyStart, article.charEnd);
    const markers: Array<{ index: number; number: string }> = [];
    let style: string | null = null;

    for (const match of body.matchAll(PARAGRAPH_MARKER)) {
      style = style ?? match[2];
      if (match[2] !== style) {
        continue;
      }
      markers.push({ index: bodyStart + (match.index ?? 0), number: match[1] });
    }

    return markers.map((marker, k) => {
      const next = k + 1 < markers.length ? markers[k + 1].index : article.charEnd;
      const end = trimEnd(text, marker.index, next);
      const number = `${article.number}.${marker.number}`;

      return freeze({
        id: ids.allocate('paragraph', number).id,
        type: 'paragraph',
        number,
        numbered: article.numbered,
        title: null,
        text: text.slice(marker.index, end),
        parentNumber: article.number,
        charStart: marker.index,
        charEnd: end,
      });
    });
  }
}

/**
 * Hands out `${type}_${number}` ids, suffixing repeats with "#2", "#3", ...
 */
class IdAllocator {
  private seen: Map<string, number> = new Map();

  allocate(type: FragmentType, number: string): { id: string; duplicate: boolean } {
    const base = `${type}_${number}`;
    const count = (this.seen.get(base) ?? 0) + 1;
    this.seen.set(base, count);
    return count === 1 ? { id: base, duplicate: false } : { id: `${base}#${count}`, duplicate: true };
  }
}

function freeze(fragment: Fragment): Fragment {
  return Object.freeze(fragment);
}

function levelOf(type: FragmentType): number {
  return type === 'chapter' ? 0 : type === 'article' ? 1 : 2;
}

function extractTitle(text: string, from: number, to: number): string | null {
  if (to <= from) {
    return null;
  }
  const title = text.slice(from, to).replace(/^[\s.:]+/u, '').trim();
  return title.length > 0 ? title : null;
}

export function computeStats(fragments: Fragment[]): SegmentationStats {
  const articles = fragments.filter((f) => f.type === 'article');
  return {
    total: fragments.length,
    chapters: fragments.filter((f) => f.type === 'chapter').length,
    articles: articles.length,
    paragraphs: fragments.filter((f) => f.type === 'paragraph').length,
    articleNumbers: articles.map((f) => f.number),
  };
}

/**
 * Human-readable table of contents (articles and their paragraphs)
 */
export function tableOfContents(fragments: Fragment[]): string[] {
  const toc: string[] = [];

  for (const fragment of fragments) {
    if (fragment.type === 'chapter') {
      toc.push(`Chapter ${fragment.number}${fragment.title ? `: ${fragment.title}` : ''}`);
    } else if (fragment.type === 'article') {
      toc.push(`  Article ${fragment.number}: ${fragment.title ?? '(untitled)'}`);
    } else {
      toc.push(`    Paragraph ${fragment.number}`);
    }
  }

  return toc;
}

/**
 * Whole text as a single unit, for documents without recognisable structure
 */
export function wholeDocumentFragment(text: string, title: string | null = null): Fragment {
  return freeze({
    id: 'article_1',
    type: 'article',
    number: '1',
    numbered: false,
    title,
    text,
    parentNumber: null,
    charStart: 0,
    charEnd: text.length,
  });
}
