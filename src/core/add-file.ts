/**
 * Read, patch and write back a project.pbxproj
 *
 * All I/O lives here; the patch itself is computed in memory and the file is
 * written once, only after every section has been processed.
 */
import * as fs from 'fs';
import * as path from 'path';
import type {
  AddFileOptions,
  AddFileResult,
  AnchorReport,
  CheckAnchorsOptions,
  FileDescriptor,
  PatchOptions,
  RecordIdentifier,
  RecordIds,
  SectionOutcome,
} from '../types/index.js';
import {
  findSourcesBuildPhaseId,
  findTargetByName,
  getMainAppTarget,
  inferLastKnownFileType,
  listGroupNames,
  parsePbxprojTargets,
} from '../parsers/pbxproj-parser.js';
import { DEFAULT_GROUP_NAME, buildAnchorRegions } from './anchors.js';
import { IncompleteAnchorsError, InvalidRecordIdError, TargetNotFoundError } from './errors.js';
import { generateRecordId, isRecordId } from './identifier.js';
import { missingSections, patchManifest } from './patcher.js';
import { resolvePbxprojPath } from './project-locator.js';

/**
 * Register a new file in an Xcode project
 */
export function addFileToProject(options: AddFileOptions): AddFileResult {
  const pbxprojPath = resolvePbxprojPath(options.project);
  const content = fs.readFileSync(pbxprojPath, 'utf-8');

  const name = options.name ?? path.basename(options.filePath);
  const file: FileDescriptor = {
    name,
    path: options.filePath,
    lastKnownFileType: options.fileType ?? inferLastKnownFileType(name),
  };

  const ids: RecordIds = {
    fileRefId: requireRecordId(options.fileRefId),
    buildFileId: requireRecordId(options.buildFileId),
  };

  const patchOptions = resolvePatchOptions(content, { ...options, projectName: projectNameOf(pbxprojPath) });
  const result = patchManifest(content, file, ids, patchOptions);

  if (options.strict) {
    const missing = missingSections(result);
    if (missing.length > 0) {
      throw new IncompleteAnchorsError(missing.map(s => s.section));
    }
  }

  const written = !options.dryRun;
  if (written) {
    fs.writeFileSync(pbxprojPath, result.content, 'utf-8');
  }

  return {
    pbxprojPath,
    file,
    ids,
    sections: result.sections,
    written,
  };
}

/**
 * Report which anchors a project currently has, without modifying it
 */
export function checkAnchors(options: CheckAnchorsOptions): AnchorReport {
  const pbxprojPath = resolvePbxprojPath(options.project);
  const content = fs.readFileSync(pbxprojPath, 'utf-8');

  const patchOptions = resolvePatchOptions(content, { ...options, projectName: projectNameOf(pbxprojPath) });
  const sections = buildAnchorRegions(patchOptions).map((region): SectionOutcome => {
    const match = region.pattern.exec(content);
    return {
      section: region.section,
      anchor: region.pattern.source,
      applied: match !== null,
      offset: match ? match.index + match[0].length : undefined,
    };
  });

  return {
    pbxprojPath,
    sections,
    groupNames: listGroupNames(content),
  };
}

/**
 * Turn group/target names into anchor options for this manifest.
 *
 * Without a target name the main app target's Sources phase is used; when no
 * target can be found the anchor falls back to the first Sources phase.
 */
export function resolvePatchOptions(
  content: string,
  options: { groupName?: string; target?: string; projectName?: string }
): PatchOptions {
  const patchOptions: PatchOptions = { groupName: options.groupName ?? DEFAULT_GROUP_NAME };
  const targets = parsePbxprojTargets(content);

  if (options.target) {
    const target = findTargetByName(targets, options.target);
    const phaseId = target ? findSourcesBuildPhaseId(content, target) : undefined;
    if (!phaseId) {
      throw new TargetNotFoundError(options.target, targets.map(t => t.name));
    }
    patchOptions.sourcesBuildPhaseId = phaseId;
    return patchOptions;
  }

  const mainTarget = getMainAppTarget(targets, options.projectName);
  const mainPhaseId = mainTarget ? findSourcesBuildPhaseId(content, mainTarget) : undefined;
  if (mainPhaseId) {
    patchOptions.sourcesBuildPhaseId = mainPhaseId;
  }

  return patchOptions;
}

function projectNameOf(pbxprojPath: string): string {
  return path.basename(path.dirname(pbxprojPath), '.xcodeproj');
}

function requireRecordId(value: string | undefined): RecordIdentifier {
  if (value === undefined) {
    return generateRecordId();
  }
  if (!isRecordId(value)) {
    throw new InvalidRecordIdError(value);
  }
  return value;
}
