/**
 * Anchor patcher: splices one line per section into raw pbxproj text
 */
import type {
  AnchorRegion,
  FileDescriptor,
  Manifest,
  PatchOptions,
  PatchResult,
  RecordIdentifier,
  RecordIds,
  SectionOutcome,
} from '../types/index.js';
import { buildAnchorRegions } from './anchors.js';

/**
 * Find an anchor and insert the region's line right after the full match.
 * A missing anchor leaves the text untouched.
 */
export function applyAnchor(
  content: Manifest,
  region: AnchorRegion,
  file: FileDescriptor,
  ids: RecordIds
): { content: Manifest; outcome: SectionOutcome } {
  const match = region.pattern.exec(content);
  if (!match) {
    return {
      content,
      outcome: { section: region.section, anchor: region.pattern.source, applied: false },
    };
  }

  const offset = match.index + match[0].length;
  return {
    content: content.slice(0, offset) + region.render(file, ids) + content.slice(offset),
    outcome: { section: region.section, anchor: region.pattern.source, applied: true, offset },
  };
}

/**
 * Patch a manifest and report what happened to each section.
 *
 * Sections are applied in a fixed order (build file, file reference, group,
 * sources phase), each against the text as left by the previous one.
 */
export function patchManifest(
  manifest: Manifest,
  file: FileDescriptor,
  ids: RecordIds,
  options: PatchOptions = {}
): PatchResult {
  let content = manifest;
  const sections: SectionOutcome[] = [];

  for (const region of buildAnchorRegions(options)) {
    const step = applyAnchor(content, region, file, ids);
    content = step.content;
    sections.push(step.outcome);
  }

  return { content, sections };
}

/**
 * Register a file in a manifest. Sections whose anchor is missing are
 * skipped silently; use patchManifest to see which ones.
 */
export function patch(
  manifest: Manifest,
  file: FileDescriptor,
  fileRefId: RecordIdentifier,
  buildFileId: RecordIdentifier
): Manifest {
  return patchManifest(manifest, file, { fileRefId, buildFileId }).content;
}

/**
 * Sections whose anchor was not found
 */
export function missingSections(result: Pick<PatchResult, 'sections'>): SectionOutcome[] {
  return result.sections.filter(s => !s.applied);
}
