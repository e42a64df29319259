/**
 * Formatters module exports
 */
import type { AddFileResult, AnchorReport } from '../types/index.js';
import { OutputFormat } from '../types/index.js';
import { formatAnchorsText, formatText } from './text.js';
import { formatAnchorsJSON, formatJSON } from './json.js';

export { formatText, formatAnchorsText, sectionLabel } from './text.js';
export { formatJSON, formatAnchorsJSON } from './json.js';

/**
 * Format an add-file result based on output format
 */
export function format(result: AddFileResult, outputFormat: OutputFormat): string {
  switch (outputFormat) {
    case OutputFormat.Text:
      return formatText(result);
    case OutputFormat.JSON:
      return formatJSON(result);
  }
}

/**
 * Format an anchor check based on output format
 */
export function formatAnchors(report: AnchorReport, outputFormat: OutputFormat): string {
  switch (outputFormat) {
    case OutputFormat.Text:
      return formatAnchorsText(report);
    case OutputFormat.JSON:
      return formatAnchorsJSON(report);
  }
}

/**
 * Parse a --format value
 */
export function parseOutputFormat(format: string): OutputFormat {
  switch (format.toLowerCase()) {
    case 'text':
      return OutputFormat.Text;
    case 'json':
      return OutputFormat.JSON;
    default:
      throw new Error(`Unknown output format: ${format}. Use text or json.`);
  }
}
