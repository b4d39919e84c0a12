import type { Fragment } from './types.js';

const LABELS: Record<Fragment['type'], string> = {
  chapter: 'Chapter',
  article: 'Article',
  paragraph: 'Paragraph',
};

/**
 * Breadcrumb of a fragment within its document, e.g.
 * "Chapter 3 → Article 15 → Paragraph 15.1"
 *
 * Ancestors are the closest preceding fragments whose range encloses the
 * fragment, so duplicate numbers elsewhere in the document do not leak in.
 */
export function fragmentPath(fragment: Fragment, fragments: Fragment[]): string {
  const parts: string[] = [];

  const enclosing = (type: Fragment['type']): Fragment | undefined => {
    let found: Fragment | undefined;
    for (const candidate of fragments) {
      if (candidate.charStart > fragment.charStart) {
        break;
      }
      if (
        candidate.type === type &&
        candidate.charStart <= fragment.charStart &&
        candidate.charEnd >= fragment.charEnd
      ) {
        found = candidate;
      }
    }
    return found;
  };

  if (fragment.type === 'paragraph') {
    const article = enclosing('article');
    const chapter = enclosing('chapter');
    if (chapter) parts.push(`${LABELS.chapter} ${chapter.number}`);
    if (article) parts.push(`${LABELS.article} ${article.number}`);
  } else if (fragment.type === 'article') {
    const chapter = enclosing('chapter');
    if (chapter) parts.push(`${LABELS.chapter} ${chapter.number}`);
  }

  parts.push(`${LABELS[fragment.type]} ${fragment.number}`);
  return parts.join(' → ');
}
