import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import JSZip from 'jszip';
import sharp from 'sharp';

export interface PdfPageSpec {
  lines: string[];
  /** Solid RGB square drawn on the page */
  imageSize?: number;
}

function escapePdfText(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/\(/g, '\\(').replace(/\)/g, '\\)');
}

/**
 * Minimal uncompressed PDF: Helvetica text lines and optional raw RGB image
 * XObjects, with a correct cross-reference table.
 */
export function buildPdf(pages: PdfPageSpec[]): Buffer {
  const objects: Buffer[] = [];
  const addObject = (body: Buffer): number => {
    objects.push(body);
    return objects.length;
  };
  const dictionary = (text: string): Buffer => Buffer.from(text, 'latin1');
  const stream = (dict: string, data: Buffer): Buffer =>
    Buffer.concat([
      dictionary(`<< ${dict} /Length ${data.length} >>\nstream\n`),
      data,
      dictionary('\nendstream'),
    ]);

  addObject(dictionary('<< /Type /Catalog /Pages 2 0 R >>'));
  addObject(Buffer.alloc(0));
  const fontId = addObject(dictionary('<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>'));

  const pageIds: number[] = [];
  for (const page of pages) {
    const commands = page.lines.map(
      (line, i) => `BT /F1 18 Tf 72 ${720 - i * 30} Td (${escapePdfText(line)}) Tj ET`
    );

    let xobjects = '';
    if (page.imageSize) {
      const size = page.imageSize;
      const pixels = Buffer.alloc(size * size * 3);
      for (let i = 0; i < pixels.length; i += 3) {
        pixels[i] = 30;
        pixels[i + 1] = 120;
        pixels[i + 2] = 200;
      }
      const imageId = addObject(
        stream(
          `/Type /XObject /Subtype /Image /Width ${size} /Height ${size} /ColorSpace /DeviceRGB /BitsPerComponent 8`,
          pixels
        )
      );
      xobjects = ` /XObject << /Im1 ${imageId} 0 R >>`;
      commands.push(`q ${size} 0 0 ${size} 72 300 cm /Im1 Do Q`);
    }

    const contentId = addObject(stream('', dictionary(commands.join('\n'))));
    pageIds.push(
      addObject(
        dictionary(
          `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Contents ${contentId} 0 R /Resources << /Font << /F1 ${fontId} 0 R >>${xobjects} >> >>`
        )
      )
    );
  }

  objects[1] = dictionary(
    `<< /Type /Pages /Kids [${pageIds.map(id => `${id} 0 R`).join(' ')}] /Count ${pageIds.length} >>`
  );

  const parts: Buffer[] = [dictionary('%PDF-1.4\n')];
  let offset = parts[0].length;
  const offsets: number[] = [];
  objects.forEach((body, i) => {
    const chunk = Buffer.concat([dictionary(`${i + 1} 0 obj\n`), body, dictionary('\nendobj\n')]);
    offsets.push(offset);
    parts.push(chunk);
    offset += chunk.length;
  });

  const xref = [
    'xref',
    `0 ${objects.length + 1}`,
    '0000000000 65535 f ',
    ...offsets.map(value => `${String(value).padStart(10, '0')} 00000 n `),
    'trailer',
    `<< /Size ${objects.length + 1} /Root 1 0 R >>`,
    'startxref',
    String(offset),
    '%%EOF',
    '',
  ].join('\n');
  parts.push(dictionary(xref));

  return Buffer.concat(parts);
}

export interface SlideSpec {
  /** One entry per shape; each shape holds paragraphs made of text runs */
  shapes: string[][][];
  images?: { width: number; height: number }[];
}

const NAMESPACES =
  'xmlns:a="http://schemas.openxmlformats.org/drawingml/2006/main" xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships" xmlns:p="http://schemas.openxmlformats.org/presentationml/2006/main"';
const RELATIONSHIPS_NS = 'http://schemas.openxmlformats.org/package/2006/relationships';
const SLIDE_REL = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/slide';
const IMAGE_REL = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/image';

function escapeXml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function relationshipsXml(entries: { id: string; type: string; target: string }[]): string {
  const body = entries
    .map(entry => `<Relationship Id="${entry.id}" Type="${entry.type}" Target="${entry.target}"/>`)
    .join('');
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?><Relationships xmlns="${RELATIONSHIPS_NS}">${body}</Relationships>`;
}

function slideXml(slide: SlideSpec): string {
  const shapes = slide.shapes
    .map(paragraphs => {
      const body = paragraphs
        .map(runs => `<a:p>${runs.map(run => `<a:r><a:t>${escapeXml(run)}</a:t></a:r>`).join('')}</a:p>`)
        .join('');
      return `<p:sp><p:txBody>${body}</p:txBody></p:sp>`;
    })
    .join('');
  const pictures = (slide.images ?? [])
    .map((_, i) => `<p:pic><p:blipFill><a:blip r:embed="rIdImg${i + 1}"/></p:blipFill></p:pic>`)
    .join('');
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?><p:sld ${NAMESPACES}><p:cSld><p:spTree>${shapes}${pictures}</p:spTree></p:cSld></p:sld>`;
}

/**
 * Minimal .pptx container. `order` lists slide numbers as presentation.xml
 * should order them; it defaults to file order.
 */
export async function buildPptx(slides: SlideSpec[], order?: number[]): Promise<Buffer> {
  const zip = new JSZip();
  const sequence = order ?? slides.map((_, i) => i + 1);
  let mediaCount = 0;

  for (const [i, slide] of slides.entries()) {
    const number = i + 1;
    zip.file(`ppt/slides/slide${number}.xml`, slideXml(slide));

    const imageRels: { id: string; type: string; target: string }[] = [];
    for (const [j, size] of (slide.images ?? []).entries()) {
      mediaCount++;
      const png = await sharp({
        create: { width: size.width, height: size.height, channels: 3, background: { r: 10, g: 200, b: 90 } },
      })
        .png()
        .toBuffer();
      zip.file(`ppt/media/image${mediaCount}.png`, png);
      imageRels.push({ id: `rIdImg${j + 1}`, type: IMAGE_REL, target: `../media/image${mediaCount}.png` });
    }
    zip.file(`ppt/slides/_rels/slide${number}.xml.rels`, relationshipsXml(imageRels));
  }

  const slideIds = sequence.map((number, i) => `<p:sldId id="${256 + i}" r:id="rIdSlide${number}"/>`).join('');
  zip.file(
    'ppt/presentation.xml',
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?><p:presentation ${NAMESPACES}><p:sldIdLst>${slideIds}</p:sldIdLst></p:presentation>`
  );
  zip.file(
    'ppt/_rels/presentation.xml.rels',
    relationshipsXml(
      slides.map((_, i) => ({ id: `rIdSlide${i + 1}`, type: SLIDE_REL, target: `slides/slide${i + 1}.xml` }))
    )
  );

  return zip.generateAsync({ type: 'nodebuffer' });
}

export async function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'pitch-deck-analyzer-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeFixture(dir: string, name: string, data: Buffer | string): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, data);
  return path;
}
