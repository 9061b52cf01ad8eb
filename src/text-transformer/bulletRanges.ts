export interface BulletRange {
  /** Offset of the line's first character, leading tabs included. */
  start: number;
  end: number;
  /** Nesting level: the number of leading tabs on the line. */
  level: number;
}

const LEADING_TABS = /^\t*/;

/**
 * Splits a content block into one bullet range per non-blank line.
 *
 * Offsets address the text exactly as inserted. `createParagraphBullets`
 * counts a paragraph's leading tabs to pick its nesting level and then deletes
 * them, and requests in a batch apply in order, so after a bulleted line the
 * cursor moves past the line minus its tabs. Blank lines are never bulleted
 * and keep their full length.
 */
export function computeBulletRanges(text: string): BulletRange[] {
  const ranges: BulletRange[] = [];
  let cursor = 0;

  for (const line of text.split('\n')) {
    if (line.trim().length === 0) {
      cursor += line.length + 1;
      continue;
    }

    const level = LEADING_TABS.exec(line)?.[0].length ?? 0;
    const length = line.slice(level).trimEnd().length;

    ranges.push({ start: cursor, end: cursor + length, level });

    cursor += line.length - level + 1;
  }

  return ranges;
}
