import { beforeEach, describe, expect, it } from 'vitest';
import { createFakeClients, sequentialIds, type FakeClients } from '../test-utils/fakeGoogleApis.js';
import { InvalidInputError, NotFoundError } from '../types.js';
import { PresentationSession } from './session.js';
import { SlideBuilder, presentationUrl, validateTable } from './slideBuilder.js';

function insert(objectId: string, text: string) {
  return { insertText: { objectId, text, insertionIndex: 0 } };
}

function cellInsert(objectId: string, text: string, rowIndex: number, columnIndex: number) {
  return { insertText: { objectId, text, insertionIndex: 0, cellLocation: { rowIndex, columnIndex } } };
}

function bullet(objectId: string, startIndex: number, endIndex: number) {
  return {
    createParagraphBullets: {
      objectId,
      textRange: { type: 'FIXED_RANGE', startIndex, endIndex },
      bulletPreset: 'BULLET_DISC_CIRCLE_SQUARE',
    },
  };
}

describe('SlideBuilder', () => {
  let fake: FakeClients;
  let builder: SlideBuilder;

  beforeEach(async () => {
    fake = createFakeClients();
    builder = new SlideBuilder({
      session: new PresentationSession(),
      getClients: fake.getClients,
      createObjectId: sequentialIds(),
    });
    await builder.createPresentation('Deck');
  });

  describe('createPresentation', () => {
    it('creates the presentation and registers its name', () => {
      expect(fake.slides.createdTitles).toEqual(['Deck']);
      expect(builder.requirePresentation('Deck')).toBe('pres-1');
      expect(builder.getPresentationUrl('Deck')).toBe(
        'https://docs.google.com/presentation/d/pres-1/edit'
      );
    });

    it('refuses a duplicate name before calling the API', async () => {
      await expect(builder.createPresentation('Deck')).rejects.toBeInstanceOf(InvalidInputError);
      expect(fake.slides.createdTitles).toEqual(['Deck']);
    });
  });

  it('fails with NotFoundError for an unknown presentation', async () => {
    await expect(builder.addTitleSlide('Other', 'Hello')).rejects.toBeInstanceOf(NotFoundError);
    expect(fake.slides.batches).toEqual([]);
  });

  it('adds a title slide with title and subtitle', async () => {
    const result = await builder.addTitleSlide('Deck', 'Hello', 'World');

    expect(result).toEqual({ presentationId: 'pres-1', slideId: 'title_1' });
    expect(fake.slides.batches.map((batch) => batch.requests)).toEqual([
      [{ createSlide: { objectId: 'title_1', slideLayoutReference: { predefinedLayout: 'TITLE' } } }],
      [insert('title_1_title', 'Hello'), insert('title_1_subtitle', 'World')],
    ]);
  });

  it('puts a section header subtitle in the body placeholder', async () => {
    await builder.addSectionHeaderSlide('Deck', 'Results', 'Q3');
    expect(fake.slides.batches[1].requests).toEqual([
      insert('section_1_title', 'Results'),
      insert('section_1_body0', 'Q3'),
    ]);
  });

  it('inserts content before bulleting it', async () => {
    await builder.addContentSlide('Deck', 'Agenda', 'a\n\tb\nc');

    expect(fake.slides.batches).toHaveLength(3);
    expect(fake.slides.batches[1].requests).toEqual([
      insert('content_1_title', 'Agenda'),
      insert('content_1_body0', 'a\n\tb\nc'),
    ]);
    expect(fake.slides.batches[2].requests).toEqual([
      bullet('content_1_body0', 0, 1),
      bullet('content_1_body0', 2, 3),
      bullet('content_1_body0', 4, 5),
    ]);
  });

  it('sends no bullet batch for empty content', async () => {
    await builder.addContentSlide('Deck', 'Blank', '');
    expect(fake.slides.batches).toHaveLength(2);
    expect(fake.slides.batches[1].requests).toEqual([insert('content_1_title', 'Blank')]);
  });

  it('bolds column headings and bullets the content below them', async () => {
    await builder.addTwoColumnSlide('Deck', 'Compare', 'Pros', 'fast\n\tcheap', 'Cons', 'slow');

    expect(fake.slides.batches[1].requests).toEqual([
      insert('twocol_1_title', 'Compare'),
      insert('twocol_1_body0', 'Pros\nfast\n\tcheap'),
      insert('twocol_1_body1', 'Cons\nslow'),
    ]);
    expect(fake.slides.batches[2].requests).toEqual([
      {
        updateTextStyle: {
          objectId: 'twocol_1_body0',
          textRange: { type: 'FIXED_RANGE', startIndex: 0, endIndex: 4 },
          style: { bold: true },
          fields: 'bold',
        },
      },
      bullet('twocol_1_body0', 5, 9),
      bullet('twocol_1_body0', 10, 15),
      {
        updateTextStyle: {
          objectId: 'twocol_1_body1',
          textRange: { type: 'FIXED_RANGE', startIndex: 0, endIndex: 4 },
          style: { bold: true },
          fields: 'bold',
        },
      },
      bullet('twocol_1_body1', 5, 9),
    ]);
  });

  describe('addTableSlide', () => {
    it('rejects ragged rows without calling the API', async () => {
      await expect(
        builder.addTableSlide('Deck', 'Scores', ['A', 'B'], [['1', '2'], ['3']])
      ).rejects.toThrow(
        'All rows must have the same number of columns as headers (row 2 has 1, expected 2)'
      );
      expect(fake.slides.batches).toEqual([]);
    });

    it('fills bold headers and the data cells', async () => {
      await builder.addTableSlide(
        'Deck',
        'Scores',
        ['Name', 'Score'],
        [
          ['Ann', 9],
          [null, true],
        ]
      );

      const batches = fake.slides.batches.map((batch) => batch.requests);
      expect(batches).toHaveLength(5);
      expect(batches[1]).toEqual([insert('table_1_title', 'Scores')]);
      expect(batches[2]).toMatchObject([
        { createTable: { objectId: 'tbl_2', rows: 3, columns: 2, elementProperties: { pageObjectId: 'table_1' } } },
      ]);
      expect(batches[3]).toEqual([
        cellInsert('tbl_2', 'Name', 0, 0),
        {
          updateTextStyle: {
            objectId: 'tbl_2',
            cellLocation: { rowIndex: 0, columnIndex: 0 },
            textRange: { type: 'ALL' },
            style: { bold: true },
            fields: 'bold',
          },
        },
        cellInsert('tbl_2', 'Score', 0, 1),
        {
          updateTextStyle: {
            objectId: 'tbl_2',
            cellLocation: { rowIndex: 0, columnIndex: 1 },
            textRange: { type: 'ALL' },
            style: { bold: true },
            fields: 'bold',
          },
        },
      ]);
      expect(batches[4]).toEqual([
        cellInsert('tbl_2', 'Ann', 1, 0),
        cellInsert('tbl_2', '9', 1, 1),
        cellInsert('tbl_2', 'true', 2, 1),
      ]);
    });
  });

  describe('addImageSlide', () => {
    it('places an image from a URL with a caption', async () => {
      await builder.addImageSlide('Deck', 'Logo', { url: 'https://example.com/logo.png' }, 'Our logo');

      const batches = fake.slides.batches.map((batch) => batch.requests);
      expect(batches).toHaveLength(4);
      expect(batches[2]).toMatchObject([
        { createImage: { objectId: 'image_2', url: 'https://example.com/logo.png' } },
      ]);
      expect(batches[3]).toMatchObject([
        { createShape: { objectId: 'caption_3', shapeType: 'TEXT_BOX' } },
        insert('caption_3', 'Our logo'),
      ]);
      expect(fake.drive.uploads).toEqual([]);
    });

    it('uploads image bytes to Drive and shares them by link', async () => {
      await builder.addImageSlide('Deck', 'Q3 Results', { data: Buffer.from('png-bytes') });

      expect(fake.drive.uploads).toEqual([{ name: 'img_Q3_Results.png', mimeType: 'image/png' }]);
      expect(fake.drive.grants).toEqual([{ fileId: 'file-1', type: 'anyone', role: 'reader' }]);
      expect(fake.slides.batches).toHaveLength(3);
      expect(fake.slides.batches[2].requests).toMatchObject([
        { createImage: { url: 'https://drive.google.com/uc?id=file-1' } },
      ]);
    });
  });
});

describe('validateTable', () => {
  it('requires headers and rows', () => {
    expect(() => validateTable([], [['x']])).toThrow('Table headers are required');
    expect(() => validateTable(['A'], [])).toThrow('Table rows are required');
    expect(() => validateTable(['A'], [['x']])).not.toThrow();
  });

  it('accepts rows matching the header count and rejects any other length', () => {
    expect(() => validateTable(['A', 'B'], [[1, 2], [3, 4]])).not.toThrow();
    for (const bad of [[1], [1, 2, 3], []]) {
      expect(() => validateTable(['A', 'B'], [[1, 2], bad])).toThrow(InvalidInputError);
    }
  });
});

describe('presentationUrl', () => {
  it('builds the edit URL', () => {
    expect(presentationUrl('abc')).toBe('https://docs.google.com/presentation/d/abc/edit');
  });
});
