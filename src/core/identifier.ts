import { randomUUID } from 'crypto';
import type { RecordIdentifier, RecordIds } from '../types/index.js';

const RECORD_ID_LENGTH = 24;

const RECORD_ID_PATTERN = /^[0-9A-F]{24}$/;

/**
 * Generate a 24-character uppercase hex ID like the ones Xcode writes.
 *
 * Taken from a random UUID; uniqueness rests on randomness alone, the
 * manifest is not consulted.
 */
export function generateRecordId(): RecordIdentifier {
  return randomUUID().replace(/-/g, '').slice(0, RECORD_ID_LENGTH).toUpperCase();
}

/**
 * Mint the file-reference and build-file IDs for one new file
 */
export function generateRecordIds(): RecordIds {
  return {
    fileRefId: generateRecordId(),
    buildFileId: generateRecordId(),
  };
}

export function isRecordId(value: string): value is RecordIdentifier {
  return RECORD_ID_PATTERN.test(value);
}
