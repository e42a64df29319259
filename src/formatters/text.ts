/**
 * Text formatter for human-readable output
 */
import chalk from 'chalk';
import type { AddFileResult, AnchorReport, SectionOutcome } from '../types/index.js';
import { AnchorSection } from '../types/index.js';

/**
 * Human label for a section
 */
export function sectionLabel(section: AnchorSection): string {
  switch (section) {
    case AnchorSection.BuildFile:
      return 'PBXBuildFile';
    case AnchorSection.FileReference:
      return 'PBXFileReference';
    case AnchorSection.Group:
      return 'PBXGroup children';
    case AnchorSection.SourcesBuildPhase:
      return 'PBXSourcesBuildPhase files';
  }
}

function formatSection(outcome: SectionOutcome, missingText: string): string {
  const label = sectionLabel(outcome.section);
  if (outcome.applied) {
    return `   ${chalk.green('✔')} ${label}`;
  }
  return `   ${chalk.yellow('⚠')} ${label}: ${chalk.yellow(missingText)}`;
}

/**
 * Format an add-file result
 */
export function formatText(result: AddFileResult): string {
  const lines: string[] = [];
  const appliedCount = result.sections.filter(s => s.applied).length;

  if (appliedCount === result.sections.length) {
    lines.push(chalk.green(`✅ Added ${result.file.name} to Xcode project`));
  } else {
    lines.push(chalk.yellow(
      `⚠️  Partially added ${result.file.name} to Xcode project (${appliedCount}/${result.sections.length} sections)`
    ));
  }
  lines.push(`   File Reference UUID: ${result.ids.fileRefId}`);
  lines.push(`   Build File UUID: ${result.ids.buildFileId}`);
  lines.push('');

  for (const outcome of result.sections) {
    lines.push(formatSection(outcome, 'anchor not found'));
  }
  lines.push('');

  if (result.written) {
    lines.push(`📝 Updated ${result.pbxprojPath}`);
  } else {
    lines.push(chalk.gray(`🔍 Dry run: ${result.pbxprojPath} was not modified`));
  }

  return lines.join('\n');
}

/**
 * Format an anchor check
 */
export function formatAnchorsText(report: AnchorReport): string {
  const lines: string[] = [chalk.bold(`🔎 Anchors in ${report.pbxprojPath}`), ''];

  for (const outcome of report.sections) {
    lines.push(formatSection(outcome, 'not found'));
  }

  const groupMissing = report.sections.some(s => s.section === AnchorSection.Group && !s.applied);
  if (groupMissing && report.groupNames.length > 0) {
    lines.push('');
    lines.push(`   Available groups: ${report.groupNames.join(', ')}`);
  }

  return lines.join('\n');
}
