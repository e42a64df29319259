/**
 * Errors raised around the patcher. The patcher itself never throws.
 */
import type { AnchorSection } from '../types/index.js';

/**
 * Error thrown when no project.pbxproj can be found for a path
 */
export class ProjectNotFoundError extends Error {
  constructor(public inputPath: string) {
    super(`No Xcode project found at ${inputPath}`);
    this.name = 'ProjectNotFoundError';
  }
}

/**
 * Error thrown when a directory holds more than one .xcodeproj
 */
export class AmbiguousProjectError extends Error {
  constructor(public inputPath: string, public candidates: string[]) {
    super(
      `Multiple Xcode projects found in ${inputPath}: ${candidates.join(', ')}. ` +
      'Pass the .xcodeproj you want to patch.'
    );
    this.name = 'AmbiguousProjectError';
  }
}

/**
 * Error thrown when a named target has no usable Sources phase
 */
export class TargetNotFoundError extends Error {
  constructor(public targetName: string, public availableTargets: string[]) {
    super(
      `No native target with a Sources build phase named "${targetName}". ` +
      `Available targets: ${availableTargets.join(', ') || 'none'}`
    );
    this.name = 'TargetNotFoundError';
  }
}

/**
 * Error thrown in strict mode when some anchors were not found
 */
export class IncompleteAnchorsError extends Error {
  constructor(public missing: AnchorSection[]) {
    super(`Anchors not found for: ${missing.join(', ')}. Project file left unchanged.`);
    this.name = 'IncompleteAnchorsError';
  }
}

/**
 * Error thrown when a caller-supplied ID is not 24 uppercase hex characters
 */
export class InvalidRecordIdError extends Error {
  constructor(public value: string) {
    super(`Invalid record ID "${value}": expected 24 uppercase hexadecimal characters`);
    this.name = 'InvalidRecordIdError';
  }
}
