import { describe, expect, it } from 'vitest';
import { convertContentToRequests, maxNestingLevel } from './contentToSlidesRequests.js';

function bullet(startIndex: number, endIndex: number, bulletPreset = 'BULLET_DISC_CIRCLE_SQUARE') {
  return {
    createParagraphBullets: {
      objectId: 'body',
      textRange: { type: 'FIXED_RANGE', startIndex, endIndex },
      bulletPreset,
    },
  };
}

describe('convertContentToRequests', () => {
  it('inserts the content and bullets each line', () => {
    const result = convertContentToRequests('a\n\tb', 'body');

    expect(result.insertRequests).toEqual([
      { insertText: { objectId: 'body', text: 'a\n\tb', insertionIndex: 0 } },
    ]);
    expect(result.formatRequests).toEqual([bullet(0, 1), bullet(2, 3)]);
  });

  it('shifts ranges by the start index and can leave insertion to the caller', () => {
    const result = convertContentToRequests('fast\n\tcheap', 'body', {
      startIndex: 5,
      skipInsert: true,
    });

    expect(result.insertRequests).toEqual([]);
    expect(result.ranges).toEqual([
      { start: 5, end: 9, level: 0 },
      { start: 10, end: 15, level: 1 },
    ]);
    expect(result.formatRequests).toEqual([bullet(5, 9), bullet(10, 15)]);
  });

  it('produces no requests for empty content', () => {
    expect(convertContentToRequests('', 'body')).toEqual({
      insertRequests: [],
      formatRequests: [],
      ranges: [],
    });
  });

  it('inserts whitespace-only content without bullets', () => {
    const result = convertContentToRequests('   ', 'body');
    expect(result.insertRequests).toHaveLength(1);
    expect(result.formatRequests).toEqual([]);
  });

  it('uses the requested bullet preset', () => {
    const result = convertContentToRequests('one', 'body', {
      bulletPreset: 'NUMBERED_DIGIT_ALPHA_ROMAN',
    });
    expect(result.formatRequests).toEqual([bullet(0, 3, 'NUMBERED_DIGIT_ALPHA_ROMAN')]);
  });
});

describe('maxNestingLevel', () => {
  it('returns the deepest level, or 0 without ranges', () => {
    expect(maxNestingLevel(convertContentToRequests('a\n\t\tb\n\tc', 'body').ranges)).toBe(2);
    expect(maxNestingLevel([])).toBe(0);
  });
});
