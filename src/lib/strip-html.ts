const LINE_BREAK_REGEX = /<br\s*\/?>/g;
const PARAGRAPH_BOUNDARY = '</p><p>';

const ENTITIES: Array<[string, string]> = [
  ['&lt;', '<'],
  ['&gt;', '>'],
  ['&amp;', '&'],
  ['&quot;', '"'],
  ['&#39;', "'"],
];

/**
 * Reduce status HTML to display text.
 *
 * Line breaks and paragraph boundaries become newlines, then every run from
 * `<` to the next `>` is dropped, then the five basic entities are decoded.
 * This is a character scan, not a parser: an unmatched `<` hides the rest of
 * the string.
 */
export function stripHtml(html: string): string {
  const marked = html.replaceAll(PARAGRAPH_BOUNDARY, '\n\n').replace(LINE_BREAK_REGEX, '\n');

  let text = '';
  let inTag = false;
  for (const char of marked) {
    if (char === '<') {
      inTag = true;
    } else if (char === '>') {
      inTag = false;
    } else if (!inTag) {
      text += char;
    }
  }

  for (const [entity, literal] of ENTITIES) {
    text = text.replaceAll(entity, literal);
  }
  return text;
}
