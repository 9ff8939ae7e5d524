/**
 * Font introspection over the raw PDF object graph
 *
 * @module services/analysis/fonts
 */

import { PDFArray, PDFDict, PDFName, PDFStream } from 'pdf-lib';
import type { PDFDocument } from 'pdf-lib';
import { EncodingType } from '../../models/analysis.js';
import type { FontInfo } from '../../models/analysis.js';

/** Font programs a viewer is expected to supply itself */
const STANDARD_FONT_SUBTYPES = new Set(['Type1', 'MMType1', 'Type3']);

const SUBSET_PREFIX = /^[A-Z]{6}\+/;

export interface FontScan {
  fonts: FontInfo[];
  /** 1-based pages per font, keyed like fontKey() */
  pages: Map<string, number[]>;
  /** Pages that reference at least one image XObject */
  imagePages: number[];
}

export function nameText(name: PDFName): string {
  return name.asString().replace(/^\//, '');
}

export function fontKey(font: FontInfo): string {
  return `${font.name}|${font.type}|${font.encoding}`;
}

function mapFontEncoding(font: PDFDict): EncodingType {
  const encoding = font.lookup(PDFName.of('Encoding'));
  if (encoding === undefined) return EncodingType.UNKNOWN;
  if (encoding instanceof PDFDict) return EncodingType.CUSTOM;
  if (!(encoding instanceof PDFName)) return EncodingType.UNKNOWN;

  switch (nameText(encoding)) {
    case 'WinAnsiEncoding':
      return EncodingType.WINANSI;
    case 'MacRomanEncoding':
      return EncodingType.MACROMAN;
    case 'Identity-H':
      return EncodingType.IDENTITY_H;
    default:
      return EncodingType.CUSTOM;
  }
}

function findDescriptor(font: PDFDict): PDFDict | undefined {
  const direct = font.lookup(PDFName.of('FontDescriptor'));
  if (direct instanceof PDFDict) return direct;

  // Composite fonts keep the descriptor on the descendant CIDFont
  const descendants = font.lookup(PDFName.of('DescendantFonts'));
  if (descendants instanceof PDFArray && descendants.size() > 0) {
    const descendant = descendants.lookup(0);
    if (descendant instanceof PDFDict) {
      const nested = descendant.lookup(PDFName.of('FontDescriptor'));
      if (nested instanceof PDFDict) return nested;
    }
  }
  return undefined;
}

function isEmbedded(font: PDFDict): boolean {
  const descriptor = findDescriptor(font);
  if (!descriptor) return false;
  return ['FontFile', 'FontFile2', 'FontFile3'].some((key) => descriptor.has(PDFName.of(key)));
}

export function describeFont(font: PDFDict): FontInfo {
  const baseFont = font.lookup(PDFName.of('BaseFont'));
  const subtype = font.lookup(PDFName.of('Subtype'));
  const name = baseFont instanceof PDFName ? nameText(baseFont) : 'unnamed';

  return {
    name,
    type: subtype instanceof PDFName ? nameText(subtype) : 'Unknown',
    encoding: mapFontEncoding(font),
    embedded: isEmbedded(font),
    subset: SUBSET_PREFIX.test(name),
  };
}

/**
 * Fonts the viewer must substitute: not embedded and not a standard type
 */
export function isMissingFont(font: FontInfo): boolean {
  return !font.embedded && !STANDARD_FONT_SUBTYPES.has(font.type);
}

/**
 * Walk every page's resources. Fonts are deduplicated by name, type and
 * encoding, in first-seen order.
 */
export function scanPageResources(doc: PDFDocument): FontScan {
  const fonts: FontInfo[] = [];
  const pages = new Map<string, number[]>();
  const imagePages: number[] = [];

  doc.getPages().forEach((page, index) => {
    const pageNumber = index + 1;
    const resources = page.node.Resources();
    if (!resources) return;

    const fontDict = resources.lookup(PDFName.of('Font'));
    if (fontDict instanceof PDFDict) {
      for (const [key] of fontDict.entries()) {
        const font = fontDict.lookup(key);
        if (!(font instanceof PDFDict)) continue;

        const info = describeFont(font);
        const id = fontKey(info);
        const seen = pages.get(id);
        if (seen) {
          if (!seen.includes(pageNumber)) seen.push(pageNumber);
        } else {
          fonts.push(info);
          pages.set(id, [pageNumber]);
        }
      }
    }

    const xobjects = resources.lookup(PDFName.of('XObject'));
    if (xobjects instanceof PDFDict) {
      const hasImage = xobjects.entries().some(([key]) => {
        const xobject = xobjects.lookup(key);
        if (!(xobject instanceof PDFStream)) return false;
        const subtype = xobject.dict.lookup(PDFName.of('Subtype'));
        return subtype instanceof PDFName && nameText(subtype) === 'Image';
      });
      if (hasImage) imagePages.push(pageNumber);
    }
  });

  return { fonts, pages, imagePages };
}
