/**
 * TypeScript interfaces for pbxpatch
 */

/**
 * Raw project.pbxproj text. Never parsed into a tree.
 */
export type Manifest = string;

/**
 * 24-character uppercase hex object ID, as Xcode writes them
 */
export type RecordIdentifier = string;

/**
 * Sections of the manifest that receive one inserted line each
 */
export enum AnchorSection {
  BuildFile = 'build-file',
  FileReference = 'file-reference',
  Group = 'group',
  SourcesBuildPhase = 'sources-build-phase',
}

/**
 * Output format for CLI results
 */
export enum OutputFormat {
  Text = 'text',
  JSON = 'json',
}

/**
 * The file being registered
 */
export interface FileDescriptor {
  /** File name as shown in Xcode (e.g., "HealthKitPermissionView.swift") */
  name: string;
  /** Path relative to the project root */
  path: string;
  /** Xcode file type; sourcecode.swift when omitted */
  lastKnownFileType?: string;
}

/**
 * The pair of IDs minted for one new file
 */
export interface RecordIds {
  /** ID of the PBXFileReference record */
  fileRefId: RecordIdentifier;
  /** ID of the PBXBuildFile record */
  buildFileId: RecordIdentifier;
}

/**
 * One anchor and the line inserted after it
 */
export interface AnchorRegion {
  section: AnchorSection;
  pattern: RegExp;
  render: (descriptor: FileDescriptor, ids: RecordIds) => string;
}

/**
 * Options that change where anchors are looked for
 */
export interface PatchOptions {
  /** Name of the PBXGroup that lists the file (default "Views") */
  groupName?: string;
  /** Pin the sources anchor to this PBXSourcesBuildPhase ID */
  sourcesBuildPhaseId?: RecordIdentifier;
}

/**
 * What happened to a single section
 */
export interface SectionOutcome {
  section: AnchorSection;
  /** Source of the anchor regex, for diagnostics */
  anchor: string;
  applied: boolean;
  /** Offset the line was inserted at, in the text as it was at that step */
  offset?: number;
}

/**
 * Result of patching a manifest
 */
export interface PatchResult {
  content: Manifest;
  sections: SectionOutcome[];
}

/**
 * Options for the add-file workflow
 */
export interface AddFileOptions {
  /** Path to project.pbxproj, an .xcodeproj, or a directory containing one */
  project: string;
  /** Path of the new file, relative to the project root */
  filePath: string;
  /** Display name; basename of filePath when omitted */
  name?: string;
  groupName?: string;
  /** Native target whose Sources phase receives the file */
  target?: string;
  fileType?: string;
  fileRefId?: RecordIdentifier;
  buildFileId?: RecordIdentifier;
  dryRun?: boolean;
  /** Refuse to write unless every anchor was found */
  strict?: boolean;
}

/**
 * Options for checking anchors without writing
 */
export interface CheckAnchorsOptions {
  project: string;
  groupName?: string;
  target?: string;
}

/**
 * Which anchors a project currently has
 */
export interface AnchorReport {
  pbxprojPath: string;
  sections: SectionOutcome[];
  /** PBXGroup names present, to help pick --group */
  groupNames: string[];
}

/**
 * Result of the add-file workflow
 */
export interface AddFileResult {
  pbxprojPath: string;
  file: FileDescriptor;
  ids: RecordIds;
  sections: SectionOutcome[];
  /** Whether the manifest was written back */
  written: boolean;
}
