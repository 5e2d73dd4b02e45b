/**
 * Pagination for DOCUMENT output. Pure: text measurement is injected, so the
 * same layout can be driven by jsPDF's metrics or by a fixed-width stand-in.
 *
 * Rules:
 *   - a block that fits on one page is never split across pages
 *   - a block taller than a page is split line by line; each continuation
 *     starts with a "(continued)" line
 *   - a block marked keepWithNext (a section heading) moves to the next page
 *     unless it fits together with the start of the following block
 *   - every page gets a "Page i of n" footer
 */

import type { DocumentLayoutConfig } from '../../lib/config.js';

export type LineStyle = 'name' | 'contact' | 'heading' | 'strong' | 'body' | 'bullet' | 'continued';

export interface LineStyleSpec {
  bold: boolean;
  italic: boolean;
  size: number;
  lineHeight: number;
  indent: number;
}

export interface SourceLine {
  text: string;
  style: LineStyle;
}

export interface Block {
  lines: SourceLine[];
  /** Keep on the same page as the first line of the next block. */
  keepWithNext?: boolean;
}

export interface PageGeometry {
  width: number;
  height: number;
  marginTop: number;
  marginBottom: number;
  marginLeft: number;
  marginRight: number;
}

export interface LayoutSettings {
  geometry: PageGeometry;
  styles: Record<LineStyle, LineStyleSpec>;
  /** Vertical space between blocks on the same page. */
  blockGap: number;
}

/** Wrap `text` to lines no wider than `maxWidth` points in `style`. */
export type TextMeasurer = (text: string, style: LineStyleSpec, maxWidth: number) => string[];

export interface PlacedLine {
  text: string;
  style: LineStyle;
  x: number;
  /** Top of the line box. */
  y: number;
}

export interface LaidOutPage {
  number: number;
  lines: PlacedLine[];
  footer: string;
}

export const CONTINUED_LABEL = '(continued)';

const PAGE_SIZES: Record<DocumentLayoutConfig['pageSize'], { width: number; height: number }> = {
  letter: { width: 612, height: 792 },
  a4: { width: 595.28, height: 841.89 },
};

/** Geometry and type scale derived from the document configuration. */
export function layoutSettingsFor(config: DocumentLayoutConfig): LayoutSettings {
  const { width, height } = PAGE_SIZES[config.pageSize];
  const base = { bold: false, italic: false, size: config.fontSize, lineHeight: config.lineHeight, indent: 0 };
  return {
    geometry: {
      width,
      height,
      marginTop: config.marginPt,
      marginBottom: config.marginPt,
      marginLeft: config.marginPt,
      marginRight: config.marginPt,
    },
    styles: {
      name: { ...base, bold: true, size: config.fontSize + 8, lineHeight: config.lineHeight + 10 },
      contact: base,
      heading: { ...base, bold: true, size: config.fontSize + 1, lineHeight: config.lineHeight + 4 },
      strong: { ...base, bold: true },
      body: base,
      bullet: { ...base, indent: 16 },
      continued: { ...base, italic: true },
    },
    blockGap: Math.round(config.lineHeight / 2),
  };
}

interface MeasuredLine {
  text: string;
  style: LineStyle;
  height: number;
  indent: number;
}

function measureBlock(block: Block, measure: TextMeasurer, settings: LayoutSettings): MeasuredLine[] {
  const { geometry, styles } = settings;
  const contentWidth = geometry.width - geometry.marginLeft - geometry.marginRight;
  return block.lines.flatMap((line) => {
    const spec = styles[line.style];
    if (!line.text.trim()) return [];
    return measure(line.text, spec, contentWidth - spec.indent).map((text) => ({
      text,
      style: line.style,
      height: spec.lineHeight,
      indent: spec.indent,
    }));
  });
}

function totalHeight(lines: MeasuredLine[]): number {
  return lines.reduce((sum, line) => sum + line.height, 0);
}

export function paginate(blocks: Block[], measure: TextMeasurer, settings: LayoutSettings): LaidOutPage[] {
  const { geometry } = settings;
  const top = geometry.marginTop;
  const bottom = geometry.height - geometry.marginBottom;
  const pageCapacity = bottom - top;
  const continued = settings.styles.continued;

  const pages: PlacedLine[][] = [[]];
  let y = top;

  const current = () => pages[pages.length - 1];
  const newPage = () => {
    pages.push([]);
    y = top;
  };
  const place = (line: MeasuredLine) => {
    current().push({ text: line.text, style: line.style, x: geometry.marginLeft + line.indent, y });
    y += line.height;
  };
  /** Vertical offset for the next block: a gap unless at the top of a page. */
  const gapBefore = () => (current().length > 0 ? settings.blockGap : 0);

  const measured = blocks.map((block) => measureBlock(block, measure, settings)).map((lines, index) => ({
    lines,
    keepWithNext: blocks[index].keepWithNext === true,
    // Set when the block must start right below the heading before it, splitting if it has to
    flowsFromHeading: false,
  }));

  measured.forEach((block, index) => {
    if (block.lines.length === 0) return;
    const height = totalHeight(block.lines);

    let required = height;
    if (block.keepWithNext) {
      const next = measured.slice(index + 1).find((b) => b.lines.length > 0);
      if (next) {
        const withWhole = height + settings.blockGap + totalHeight(next.lines);
        if (withWhole <= pageCapacity) {
          required = withWhole;
        } else {
          // Heading and block never share one page, so the heading keeps only the first line
          required = height + settings.blockGap + next.lines[0].height;
          next.flowsFromHeading = true;
        }
      }
    }

    const movesWhole = !block.flowsFromHeading && required <= pageCapacity;
    if (current().length > 0 && movesWhole && y + gapBefore() + required > bottom) newPage();
    y += gapBefore();

    if (y + height <= bottom) {
      block.lines.forEach(place);
      return;
    }

    // Does not fit in the room left: split, marking each continuation
    block.lines.forEach((line, lineIndex) => {
      if (y + line.height > bottom) {
        newPage();
        if (lineIndex > 0) {
          place({ text: CONTINUED_LABEL, style: 'continued', height: continued.lineHeight, indent: continued.indent });
        }
      }
      place(line);
    });
  });

  return pages.map((lines, i) => ({
    number: i + 1,
    lines,
    footer: `Page ${i + 1} of ${pages.length}`,
  }));
}
