/**
 * Anchor definitions for the four manifest sections a new source file touches.
 *
 * Each anchor is matched against raw pbxproj text; the new line goes right
 * after the full match. Patterns deliberately stop at the first `}` so a
 * group or build phase anchor never runs into the next record.
 */
import type { AnchorRegion, FileDescriptor, PatchOptions, RecordIdentifier, RecordIds } from '../types/index.js';
import { AnchorSection } from '../types/index.js';

export const DEFAULT_GROUP_NAME = 'Views';

export const DEFAULT_FILE_TYPE = 'sourcecode.swift';

const BUILD_FILE_SECTION = /\/\* Begin PBXBuildFile section \*\/\n/;
const FILE_REFERENCE_SECTION = /\/\* Begin PBXFileReference section \*\/\n/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/**
 * Anchor for a PBXGroup's `children = (` opener, found by its comment name
 */
export function groupAnchor(groupName: string): RegExp {
  return new RegExp(`\\/\\* ${escapeRegExp(groupName)} \\*\\/ = \\{[^}]+children = \\(\\n`);
}

/**
 * Anchor for a PBXSourcesBuildPhase's `files = (` opener.
 * Without an ID the first Sources phase in the file wins.
 */
export function sourcesBuildPhaseAnchor(phaseId?: RecordIdentifier): RegExp {
  const head = phaseId
    ? `${escapeRegExp(phaseId)} \\/\\* [^*]+ \\*\\/ = \\{`
    : '\\/\\* Sources \\*\\/ = \\{';
  return new RegExp(`${head}[^}]+isa = PBXSourcesBuildPhase;[^}]+files = \\(\\n`);
}

export function renderBuildFileLine(file: FileDescriptor, ids: RecordIds): string {
  return `\t\t${ids.buildFileId} /* ${file.name} in Sources */ = {isa = PBXBuildFile; fileRef = ${ids.fileRefId} /* ${file.name} */; };\n`;
}

export function renderFileReferenceLine(file: FileDescriptor, ids: RecordIds): string {
  const fileType = file.lastKnownFileType ?? DEFAULT_FILE_TYPE;
  return `\t\t${ids.fileRefId} /* ${file.name} */ = {isa = PBXFileReference; lastKnownFileType = ${fileType}; path = ${file.name}; sourceTree = "<group>"; };\n`;
}

export function renderGroupChildLine(file: FileDescriptor, ids: RecordIds): string {
  return `\t\t\t\t${ids.fileRefId} /* ${file.name} */,\n`;
}

export function renderSourcesFileLine(file: FileDescriptor, ids: RecordIds): string {
  return `\t\t\t\t${ids.buildFileId} /* ${file.name} in Sources */,\n`;
}

/**
 * The four anchors in the order they are applied
 */
export function buildAnchorRegions(options: PatchOptions = {}): AnchorRegion[] {
  return [
    {
      section: AnchorSection.BuildFile,
      pattern: BUILD_FILE_SECTION,
      render: renderBuildFileLine,
    },
    {
      section: AnchorSection.FileReference,
      pattern: FILE_REFERENCE_SECTION,
      render: renderFileReferenceLine,
    },
    {
      section: AnchorSection.Group,
      pattern: groupAnchor(options.groupName ?? DEFAULT_GROUP_NAME),
      render: renderGroupChildLine,
    },
    {
      section: AnchorSection.SourcesBuildPhase,
      pattern: sourcesBuildPhaseAnchor(options.sourcesBuildPhaseId),
      render: renderSourcesFileLine,
    },
  ];
}
