import { BoundingBox, Element, ElementKind } from './types/index.js';

export const IMAGE_KINDS: ReadonlySet<ElementKind> = new Set(['image', 'page_image']);

export function isImageElement(element: Element): boolean {
  return IMAGE_KINDS.has(element.kind);
}

/**
 * Build a frozen element with its vertical center derived from the box
 */
export function createElement(
  kind: ElementKind,
  content: string,
  boundingBox: BoundingBox,
  pageNumber: number
): Element {
  const box: BoundingBox = Object.freeze([boundingBox[0], boundingBox[1], boundingBox[2], boundingBox[3]] as const);
  return Object.freeze({
    kind,
    content,
    boundingBox: box,
    pageNumber,
    verticalCenter: (box[1] + box[3]) / 2,
  });
}

/**
 * Sort into reading order: page, then vertical center.
 * Returns a new array; Array.prototype.sort is stable so ties keep emission order.
 */
export function orderElements(elements: readonly Element[]): Element[] {
  return [...elements].sort(
    (a, b) => a.pageNumber - b.pageNumber || a.verticalCenter - b.verticalCenter
  );
}
