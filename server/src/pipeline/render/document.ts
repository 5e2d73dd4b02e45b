import { jsPDF } from 'jspdf';
import type { DocumentLayoutConfig } from '../../lib/config.js';
import type { TailoredResult } from '../types.js';
import {
  layoutSettingsFor,
  paginate,
  type Block,
  type LineStyleSpec,
  type TextMeasurer,
} from './document-layout.js';

// Fixed metadata keeps identical results byte-identical
const CREATION_DATE = new Date(Date.UTC(2000, 0, 1));
const FILE_ID = '00000000000000000000000000000000';
const FOOTER_FONT_SIZE = 9;

/** WinAnsi characters above U+00FF that jsPDF's standard fonts encode natively. */
const WINANSI_ABOVE_FF = new Set([
  '\u20AC', '\u201A', '\u0192', '\u201E', '\u2026', '\u2020', '\u2021',
  '\u02C6', '\u2030', '\u0160', '\u2039', '\u0152', '\u017D',
  '\u2018', '\u2019', '\u201C', '\u201D', '\u2022', '\u2013', '\u2014',
  '\u02DC', '\u2122', '\u0161', '\u203A', '\u0153', '\u017E', '\u0178',
]);

export function sanitizePdfText(input: string): string {
  return input
    .replace(/\s+/g, ' ')
    // Uncommon bullet variants become U+2022
    .replace(/[\u2023\u25E6\u2043\u00B7\u2027]/g, '\u2022')
    .replace(/\u2032/g, "'")
    .replace(/\u2033/g, '"')
    .replace(/\u02BC/g, '\u2019')
    .replace(/\u00A0/g, ' ')
    .replace(/[^\x00-\xFF]/g, (ch) => {
      if (WINANSI_ABOVE_FF.has(ch)) return ch;
      return ch.normalize('NFKD').replace(/[^\x00-\xFF]/g, '');
    })
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F\u200B-\u200F\u2028\u2029\uFEFF]/g, '')
    .trim();
}

// ─── Content blocks ──────────────────────────────────────────────────

export function buildBlocks(result: TailoredResult): Block[] {
  switch (result.kind) {
    case 'TAILOR_RESUME': {
      const { contact } = result;
      const contactLine = [contact.email, contact.phone, contact.location, ...contact.links]
        .filter((part): part is string => Boolean(part?.trim()))
        .join(' | ');
      const blocks: Block[] = [{
        lines: [
          { text: contact.name.toUpperCase(), style: 'name' },
          { text: contactLine, style: 'contact' },
        ],
      }];
      for (const section of result.sections) {
        blocks.push({ lines: [{ text: section.title.toUpperCase(), style: 'heading' }], keepWithNext: true });
        for (const entry of section.entries) {
          const heading = [entry.title, entry.organization].filter(Boolean).join(' | ');
          blocks.push({
            lines: [
              { text: heading, style: 'strong' },
              { text: entry.period ?? '', style: 'body' },
              { text: entry.summary ?? '', style: 'body' },
              ...entry.highlights.map((h) => ({ text: `\u2022 ${h}`, style: 'bullet' as const })),
            ],
          });
        }
      }
      return blocks;
    }
    case 'COVER_LETTER':
      return [
        { lines: [{ text: result.greeting, style: 'body' }] },
        ...result.paragraphs.map((p): Block => ({ lines: [{ text: p, style: 'body' }] })),
        { lines: [{ text: result.closing, style: 'body' }, { text: result.signature, style: 'strong' }] },
      ];
    case 'ANSWER_QUESTIONS':
      return result.answers.map((item, index): Block => ({
        lines: [
          { text: `Q${index + 1}. ${item.question}`, style: 'strong' },
          ...item.answer.split(/\n+/).map((text) => ({ text, style: 'body' as const })),
        ],
      }));
  }
}

// ─── PDF encoding ────────────────────────────────────────────────────

function applyStyle(doc: jsPDF, style: LineStyleSpec): void {
  const fontStyle = style.bold ? 'bold' : style.italic ? 'italic' : 'normal';
  doc.setFont('helvetica', fontStyle);
  doc.setFontSize(style.size);
}

function toLines(value: unknown): string[] {
  if (typeof value === 'string') return [value];
  return Array.isArray(value) ? value.filter((line): line is string => typeof line === 'string') : [];
}

/** Wraps with jsPDF's font metrics. */
export function createPdfMeasurer(doc: jsPDF): TextMeasurer {
  return (text, style, maxWidth) => {
    applyStyle(doc, style);
    return toLines(doc.splitTextToSize(sanitizePdfText(text), maxWidth));
  };
}

/** Paginate and encode a result as a PDF. */
export function renderDocument(result: TailoredResult, config: DocumentLayoutConfig): Uint8Array {
  const doc = new jsPDF({ orientation: 'portrait', unit: 'pt', format: config.pageSize });
  doc.setCreationDate(CREATION_DATE);
  doc.setFileId(FILE_ID);

  const settings = layoutSettingsFor(config);
  const pages = paginate(buildBlocks(result), createPdfMeasurer(doc), settings);
  const { geometry } = settings;

  pages.forEach((page, index) => {
    if (index > 0) doc.addPage();
    for (const line of page.lines) {
      const style = settings.styles[line.style];
      applyStyle(doc, style);
      // jsPDF positions text by baseline
      doc.text(line.text, line.x, line.y + style.size);
    }

    doc.setFont('helvetica', 'normal');
    doc.setFontSize(FOOTER_FONT_SIZE);
    const footerWidth = doc.getTextWidth(page.footer);
    doc.text(
      page.footer,
      geometry.width - geometry.marginRight - footerWidth,
      geometry.height - geometry.marginBottom / 2,
    );
  });

  return new Uint8Array(doc.output('arraybuffer'));
}
