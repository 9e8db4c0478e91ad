import { describe, test, expect, beforeAll, afterAll } from '@jest/globals';
import JSZip from 'jszip';
import { SlideDeckExtractor, orderedSlidePaths } from '../../../../src/core/extraction/slideDeckExtractor';
import { buildPptx, createTempDir, removeTempDir, writeFixture } from '../../../helpers/fixtures';

describe('SlideDeckExtractor', () => {
  let dir: string;
  const extractor = new SlideDeckExtractor();

  beforeAll(async () => {
    dir = await createTempDir();
  });

  afterAll(async () => {
    await removeTempDir(dir);
  });

  test('extracts text per slide in presentation order', async () => {
    const deck = await buildPptx(
      [
        { shapes: [[['Acme Robotics']], [['Warehouse robots'], ['Seed ', 'round']]] },
        { shapes: [[['Team']]] },
        { shapes: [] },
      ],
      [2, 1, 3]
    );
    const path = await writeFixture(dir, 'acme.pptx', deck);

    const result = await extractor.extract(path);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.metadata).toEqual({
      fileName: 'acme.pptx',
      fileType: 'PowerPoint',
      slideCount: 3,
      fileSize: deck.length,
    });
    expect(result.segments).toEqual([
      { index: 1, text: 'Team' },
      { index: 2, text: 'Acme Robotics\nWarehouse robots\nSeed round' },
    ]);
    expect(result.fullText).toBe('Team\n\nAcme Robotics\nWarehouse robots\nSeed round');
  });

  test('keeps pictures larger than 50x50 with their slide number', async () => {
    const deck = await buildPptx([
      { shapes: [[['Intro']]] },
      {
        shapes: [[['Product']]],
        images: [
          { width: 120, height: 80 },
          { width: 20, height: 20 },
        ],
      },
    ]);
    const path = await writeFixture(dir, 'pictures.pptx', deck);

    const result = await extractor.extract(path);

    expect(result.images.map(({ width, height, segmentIndex }) => ({ width, height, segmentIndex }))).toEqual([
      { width: 120, height: 80, segmentIndex: 2 },
    ]);
  });

  test('fails closed on a legacy binary deck', async () => {
    const path = await writeFixture(dir, 'legacy.ppt', Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]));

    const result = await extractor.extract(path);

    expect(result.success).toBe(false);
    expect(result.metadata).toEqual({ fileName: 'legacy.ppt', fileType: 'PowerPoint' });
  });
});

describe('orderedSlidePaths', () => {
  test('falls back to numeric slide order without presentation.xml', async () => {
    const zip = new JSZip();
    zip.file('ppt/slides/slide10.xml', '<p:sld/>');
    zip.file('ppt/slides/slide2.xml', '<p:sld/>');
    zip.file('ppt/slides/slide1.xml', '<p:sld/>');
    zip.file('ppt/slides/_rels/slide1.xml.rels', '<Relationships/>');

    await expect(orderedSlidePaths(zip)).resolves.toEqual([
      'ppt/slides/slide1.xml',
      'ppt/slides/slide2.xml',
      'ppt/slides/slide10.xml',
    ]);
  });
});
