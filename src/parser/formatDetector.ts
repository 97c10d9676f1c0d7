import type { MessageFormat } from '../domain/entities/ParsedJob.js';
import {
  extractLabeledAmount,
  extractStandaloneAmount,
  isAddressLine,
  splitLines,
} from './fieldExtractors.js';

export type DetectedFormat = MessageFormat | 'unknown';

const FIELD_LABEL_MARKER = /\b(?:date|ph|phone|addr|address|desc|description|occu)\s*:/i;
const TOTAL_LABEL_MARKER = /\btotal\b[a-z ]*:/i;

export function hasLabelMarker(text: string): boolean {
  return FIELD_LABEL_MARKER.test(text) || TOTAL_LABEL_MARKER.test(text);
}

/**
 * Classifies a raw message. Checked in priority order labeled > standard > simple;
 * anything else is 'unknown' and must not be parsed on a guess.
 */
export function detectFormat(text: string): DetectedFormat {
  if (hasLabelMarker(text)) {
    return 'labeled';
  }

  const lines = splitLines(text);
  const addressIndex = lines.findIndex(isAddressLine);
  if (
    addressIndex >= 0 &&
    lines.slice(addressIndex + 1).some((line) => extractStandaloneAmount(line) !== null)
  ) {
    return 'standard';
  }

  if (extractLabeledAmount(lines, 'total')) {
    return 'simple';
  }

  return 'unknown';
}
