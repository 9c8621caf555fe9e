/**
 * PDF element extractor
 * Reads page text and embedded images with pdfjs-dist. A page without
 * embedded images is rendered whole with @napi-rs/canvas instead, so vector
 * drawings still reach the oracle. Every image is re-encoded as a bounded
 * JPEG thumbnail with sharp.
 */

import { readFile } from 'fs/promises';
import sharp from 'sharp';
import { createCanvas } from '@napi-rs/canvas';
import { getDocument, OPS } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { Element, ElementExtractor, ElementKind } from '../types/index.js';
import { createElement } from '../elements.js';
import type { ImageConfig } from '../config.js';

type PdfDocument = Awaited<ReturnType<typeof getDocument>['promise']>;
type PdfPage = Awaited<ReturnType<PdfDocument['getPage']>>;

const Y_BUCKET_TOLERANCE = 2;
const PAGE_RASTER_SCALE = 2;

// pdfjs ImageKind values
const GRAYSCALE_1BPP = 1;
const RGB_24BPP = 2;
const RGBA_32BPP = 3;

export interface RawImage {
  width: number;
  height: number;
  kind: number;
  data: Uint8Array | Uint8ClampedArray;
}

export interface PixelBuffer {
  pixels: Buffer;
  channels: 1 | 3 | 4;
}

function isRawImage(value: unknown): value is RawImage {
  return (
    typeof value === 'object' && value !== null &&
    'width' in value && typeof value.width === 'number' &&
    'height' in value && typeof value.height === 'number' &&
    'kind' in value && typeof value.kind === 'number' &&
    'data' in value && (value.data instanceof Uint8Array || value.data instanceof Uint8ClampedArray)
  );
}

/**
 * Convert a decoded pdfjs image into raw pixels sharp can read.
 * 1-bit rows are byte-padded; a set bit is white.
 */
export function toPixelBuffer(image: RawImage): PixelBuffer | null {
  const { width, height, kind, data } = image;
  if (width <= 0 || height <= 0) return null;

  const bytes = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  if (kind === RGB_24BPP) return { pixels: bytes, channels: 3 };
  if (kind === RGBA_32BPP) return { pixels: bytes, channels: 4 };
  if (kind !== GRAYSCALE_1BPP) return null;

  const rowBytes = (width + 7) >> 3;
  const gray = Buffer.alloc(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const byte = data[y * rowBytes + (x >> 3)] ?? 0;
      gray[y * width + x] = (byte >> (7 - (x & 7))) & 1 ? 255 : 0;
    }
  }
  return { pixels: gray, channels: 1 };
}

interface PositionedText {
  text: string;
  x: number;
  y: number;
}

/**
 * Join positioned text items into lines, top of page first
 */
export function joinTextLines(items: readonly PositionedText[]): string {
  const lines: Array<{ y: number; items: PositionedText[] }> = [];
  for (const item of items) {
    const line = lines.find((candidate) => Math.abs(candidate.y - item.y) <= Y_BUCKET_TOLERANCE);
    if (line) {
      line.items.push(item);
    } else {
      lines.push({ y: item.y, items: [item] });
    }
  }

  return lines
    .sort((a, b) => b.y - a.y)  // PDF origin is bottom-left
    .map((line) => line.items.sort((a, b) => a.x - b.x).map((item) => item.text).join('').trim())
    .filter((text) => text.length > 0)
    .join('\n');
}

export class PdfElementExtractor implements ElementExtractor {
  constructor(private readonly images: Readonly<ImageConfig>) {}

  async extract(documentPath: string): Promise<Element[]> {
    console.error(`[PDF] Extracting elements from ${documentPath}`);
    const elements: Element[] = [];

    try {
      const data = new Uint8Array(await readFile(documentPath));
      const doc = await getDocument({
        data,
        useSystemFonts: true,
        isEvalSupported: false,
        disableFontFace: true,
        isOffscreenCanvasSupported: false,
      }).promise;

      try {
        for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber++) {
          const page = await doc.getPage(pageNumber);
          const { width, height } = page.getViewport({ scale: 1.0 });

          const text = await this.extractPageText(page);
          if (text) {
            elements.push(createElement('text', text, [0, 0, width, height], pageNumber));
            console.error(`[PDF] Page ${pageNumber}: ${text.length} chars of text`);
          } else {
            console.error(`[PDF] Page ${pageNumber}: no text found`);
          }

          const pageImages = await this.extractPageImages(page, pageNumber);
          elements.push(...pageImages);
          console.error(`[PDF] Page ${pageNumber}: ${pageImages.length} embedded images`);

          if (pageImages.length === 0) {
            const raster = await this.renderPage(page, pageNumber);
            if (raster) elements.push(raster);
          }
        }
      } finally {
        await doc.destroy();
      }
    } catch (error) {
      console.error(`[PDF] Extraction failed for ${documentPath}:`, error instanceof Error ? error.message : error);
      return [];
    }

    console.error(`[PDF] Extracted ${elements.length} elements`);
    return elements;
  }

  private async extractPageText(page: PdfPage): Promise<string> {
    const content = await page.getTextContent();
    const items: PositionedText[] = [];
    for (const item of content.items) {
      if (!('str' in item) || !item.str) continue;
      items.push({ text: item.str, x: Number(item.transform[4]), y: Number(item.transform[5]) });
    }
    return joinTextLines(items);
  }

  private async extractPageImages(page: PdfPage, pageNumber: number): Promise<Element[]> {
    const elements: Element[] = [];
    const operatorList = await page.getOperatorList();
    const seen = new Set<string>();

    for (let i = 0; i < operatorList.fnArray.length; i++) {
      if (operatorList.fnArray[i] !== OPS.paintImageXObject) continue;

      const args: unknown = operatorList.argsArray[i];
      const name: unknown = Array.isArray(args) ? args[0] : undefined;
      if (typeof name !== 'string' || seen.has(name)) continue;
      seen.add(name);

      try {
        const store = page.objs.has(name) ? page.objs : page.commonObjs;
        const image: unknown = store.get(name);
        if (!isRawImage(image)) continue;

        const element = await this.encodeImage(image, pageNumber);
        if (element) elements.push(element);
      } catch (error) {
        console.error(`[PDF] Image ${name} on page ${pageNumber} skipped:`, error instanceof Error ? error.message : error);
      }
    }

    return elements;
  }

  /**
   * Whole-page screenshot for pages that carry no embedded image.
   * A render failure is logged and yields no element.
   */
  private async renderPage(page: PdfPage, pageNumber: number): Promise<Element | null> {
    try {
      const viewport = page.getViewport({ scale: PAGE_RASTER_SCALE });
      const canvas = createCanvas(Math.max(1, Math.floor(viewport.width)), Math.max(1, Math.floor(viewport.height)));
      await page.render({ canvasContext: canvas.getContext('2d'), viewport }).promise;

      const element = await this.toThumbnail(sharp(canvas.toBuffer('image/png')), 'page_image', pageNumber);
      console.error(`[PDF] Page ${pageNumber}: page screenshot added`);
      return element;
    } catch (error) {
      console.error(`[PDF] Page ${pageNumber} screenshot failed:`, error instanceof Error ? error.message : error);
      return null;
    }
  }

  private async encodeImage(image: RawImage, pageNumber: number): Promise<Element | null> {
    const pixels = toPixelBuffer(image);
    if (!pixels) return null;

    const input = sharp(pixels.pixels, {
      raw: { width: image.width, height: image.height, channels: pixels.channels },
    });
    return this.toThumbnail(input, 'image', pageNumber);
  }

  private async toThumbnail(input: sharp.Sharp, kind: ElementKind, pageNumber: number): Promise<Element> {
    const { data, info } = await input
      .flatten({ background: '#ffffff' })
      .resize({ width: this.images.maxSize, height: this.images.maxSize, fit: 'inside', withoutEnlargement: true })
      .jpeg({ quality: this.images.quality })
      .toBuffer({ resolveWithObject: true });

    return createElement(kind, data.toString('base64'), [0, 0, info.width, info.height], pageNumber);
  }
}
