/**
 * pbxpatch - register source files in Xcode project.pbxproj files
 *
 * Main library entry point for programmatic usage
 */

// Types
export * from './types/index.js';

// Parsers
export * from './parsers/index.js';

// Core
export { generateRecordId, generateRecordIds, isRecordId } from './core/identifier.js';
export {
  DEFAULT_GROUP_NAME,
  DEFAULT_FILE_TYPE,
  buildAnchorRegions,
  groupAnchor,
  sourcesBuildPhaseAnchor,
} from './core/anchors.js';
export { patch, patchManifest, applyAnchor, missingSections } from './core/patcher.js';
export { resolvePbxprojPath } from './core/project-locator.js';
export { addFileToProject, checkAnchors, resolvePatchOptions } from './core/add-file.js';
export * from './core/errors.js';

// Formatters
export {
  format,
  formatAnchors,
  formatText,
  formatAnchorsText,
  formatJSON,
  formatAnchorsJSON,
  parseOutputFormat,
} from './formatters/index.js';

// CLI and MCP
export { createProgram } from './cli/program.js';
export { createMcpServer } from './mcp/server.js';
