import type { DocumentLayoutConfig } from '../../lib/config.js';
import { PipelineError, RenderError } from '../../lib/errors.js';
import { CONTENT_TYPES, OUTPUT_FORMATS, type OutputFormat, type RenderedOutput, type TailoredResult } from '../types.js';
import { renderDocument } from './document.js';
import { renderStructured } from './structured.js';
import { renderText } from './text.js';

export interface RenderOptions {
  document: DocumentLayoutConfig;
}

const encoder = new TextEncoder();

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function encode(result: TailoredResult, format: OutputFormat, options: RenderOptions): Uint8Array {
  switch (format) {
    case 'STRUCTURED':
      return encoder.encode(renderStructured(result));
    case 'TEXT':
      return encoder.encode(renderText(result));
    case 'DOCUMENT':
      return renderDocument(result, options.document);
  }
}

/**
 * Render a parsed result. Formats are validated before the pipeline runs, so
 * any failure here is a defect and surfaces as RenderError.
 */
export function renderResult(result: TailoredResult, format: string, options: RenderOptions): RenderedOutput {
  if (!isOutputFormat(format)) {
    throw new RenderError(`Unsupported output format: ${format}`);
  }
  try {
    return { format, contentType: CONTENT_TYPES[format], body: encode(result, format, options) };
  } catch (err) {
    if (err instanceof PipelineError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new RenderError(`Failed to render ${format}: ${message}`);
  }
}
