/**
 * JSON formatter for machine-readable output
 */
import type { AddFileResult, AnchorReport } from '../types/index.js';

/**
 * Format an add-file result as JSON
 */
export function formatJSON(result: AddFileResult): string {
  return JSON.stringify(result, null, 2);
}

/**
 * Format an anchor check as JSON
 */
export function formatAnchorsJSON(report: AnchorReport): string {
  return JSON.stringify(report, null, 2);
}
