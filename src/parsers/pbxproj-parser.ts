/**
 * Read-only helpers over Xcode project.pbxproj text
 *
 * These never build a full object graph. Records are located with regexes
 * and, where values may contain braces, a brace counter that respects quotes.
 */
import * as path from 'path';
import type { RecordIdentifier } from '../types/index.js';

/**
 * Product types that matter when choosing a default target
 */
export enum ProductType {
  Application = 'com.apple.product-type.application',
  ApplicationOnDemandInstall = 'com.apple.product-type.application.on-demand-install-capable',
  AppExtension = 'com.apple.product-type.app-extension',
  WatchApp = 'com.apple.product-type.application.watchapp2',
  UnitTest = 'com.apple.product-type.bundle.unit-test',
  UITest = 'com.apple.product-type.bundle.ui-testing',
  Framework = 'com.apple.product-type.framework',
  StaticLibrary = 'com.apple.product-type.library.static',
}

/**
 * Higher number = better default target for new source files
 */
const PRODUCT_TYPE_PRIORITY: Record<string, number> = {
  [ProductType.Application]: 100,
  [ProductType.ApplicationOnDemandInstall]: 95, // App Clip
  [ProductType.WatchApp]: 50,
  [ProductType.AppExtension]: 30,
  [ProductType.Framework]: 20,
  [ProductType.StaticLibrary]: 15,
  [ProductType.UnitTest]: 5,
  [ProductType.UITest]: 5,
};

/**
 * A native target parsed from pbxproj
 */
export interface PbxprojTarget {
  /** The unique ID in the pbxproj (e.g., "ABC123DEF456") */
  id: string;
  /** Target name (e.g., "MyApp") */
  name: string;
  /** Product type (e.g., "com.apple.product-type.application") */
  productType: string;
  /** Reference to the build configuration list */
  buildConfigurationListId: string;
  /** IDs listed in buildPhases, in order */
  buildPhaseIds: string[];
  /** Product name if specified */
  productName?: string;
}

/**
 * lastKnownFileType by lower-cased extension
 */
const FILE_TYPES_BY_EXTENSION: Record<string, string> = {
  '.swift': 'sourcecode.swift',
  '.m': 'sourcecode.c.objc',
  '.mm': 'sourcecode.cpp.objcpp',
  '.c': 'sourcecode.c.c',
  '.cpp': 'sourcecode.cpp.cpp',
  '.h': 'sourcecode.c.h',
  '.metal': 'sourcecode.metal',
  '.storyboard': 'file.storyboard',
  '.xib': 'file.xib',
  '.plist': 'text.plist.xml',
  '.strings': 'text.plist.strings',
  '.xcassets': 'folder.assetcatalog',
  '.json': 'text.json',
  '.md': 'net.daringfireball.markdown',
};

const RECORD_HEADER = /([A-Fa-f0-9]{24})\s*\/\*\s*([^*]+?)\s*\*\/\s*=\s*\{/g;

/**
 * Parse all PBXNativeTarget entries from pbxproj content
 *
 * @param content The raw pbxproj file content
 * @returns Array of parsed targets
 */
export function parsePbxprojTargets(content: string): PbxprojTarget[] {
  const targets: PbxprojTarget[] = [];

  // Format: ID /* Name */ = { isa = PBXNativeTarget; ... };
  const targetRegex = /([A-Fa-f0-9]{24})\s*\/\*\s*([^*]+?)\s*\*\/\s*=\s*\{([^}]*isa\s*=\s*PBXNativeTarget[^}]*(?:\{[^}]*\}[^}]*)*)\};/g;

  let match;
  while ((match = targetRegex.exec(content)) !== null) {
    const id = match[1];
    const name = match[2].trim();
    const block = match[3];

    const productTypeMatch = block.match(/productType\s*=\s*"([^"]+)"/);
    const productType = productTypeMatch ? productTypeMatch[1] : '';

    const configListMatch = block.match(/buildConfigurationList\s*=\s*([A-Fa-f0-9]{24})/);
    const buildConfigurationListId = configListMatch ? configListMatch[1] : '';

    const phasesMatch = block.match(/buildPhases\s*=\s*\(([^)]*)\)/);
    const buildPhaseIds = phasesMatch ? extractIds(phasesMatch[1]) : [];

    const productNameMatch = block.match(/productName\s*=\s*"?([^";]+)"?\s*;/);
    const productName = productNameMatch ? productNameMatch[1].trim() : undefined;

    if (productType) {
      targets.push({
        id,
        name,
        productType,
        buildConfigurationListId,
        buildPhaseIds,
        productName,
      });
    }
  }

  return targets;
}

/**
 * Get the priority score for a product type
 */
export function getProductTypePriority(productType: string): number {
  return PRODUCT_TYPE_PRIORITY[productType] ?? 0;
}

/**
 * Get the main app target from a list of targets
 *
 * Selection criteria:
 * 1. Product type priority (application > extension > test)
 * 2. Name matching project name (tie-breaker)
 * 3. Shorter name, then file order
 */
export function getMainAppTarget(
  targets: PbxprojTarget[],
  projectName?: string
): PbxprojTarget | undefined {
  if (targets.length === 0) {
    return undefined;
  }

  const normalize = (name: string) => name.toLowerCase().replace(/[^a-z0-9]/g, '');

  const sorted = [...targets].sort((a, b) => {
    const priorityA = getProductTypePriority(a.productType);
    const priorityB = getProductTypePriority(b.productType);

    if (priorityA !== priorityB) {
      return priorityB - priorityA;
    }

    if (projectName) {
      const normalizedProject = normalize(projectName);
      const matchA = normalize(a.name) === normalizedProject;
      const matchB = normalize(b.name) === normalizedProject;

      if (matchA && !matchB) return -1;
      if (matchB && !matchA) return 1;
    }

    // Shorter names are less likely to be "MyAppTests", "MyAppUITests"
    return a.name.length - b.name.length;
  });

  return sorted[0];
}

/**
 * Find a target by name, falling back to a case-insensitive match
 */
export function findTargetByName(targets: PbxprojTarget[], name: string): PbxprojTarget | undefined {
  return targets.find(t => t.name === name)
    ?? targets.find(t => t.name.toLowerCase() === name.toLowerCase());
}

/**
 * ID of the PBXSourcesBuildPhase among a target's build phases
 */
export function findSourcesBuildPhaseId(
  content: string,
  target: PbxprojTarget
): RecordIdentifier | undefined {
  return target.buildPhaseIds.find(phaseId =>
    new RegExp(`${phaseId}\\s*\\/\\*[^*]*\\*\\/\\s*=\\s*\\{\\s*isa\\s*=\\s*PBXSourcesBuildPhase\\s*;`).test(content)
  );
}

/**
 * Comment names of every PBXGroup, in file order
 */
export function listGroupNames(content: string): string[] {
  const names: string[] = [];
  const headerRegex = new RegExp(RECORD_HEADER.source, 'g');

  let match;
  while ((match = headerRegex.exec(content)) !== null) {
    const block = extractBalancedBlock(content, match.index + match[0].length);
    if (!block) continue;
    if (!/isa\s*=\s*PBXGroup\s*;/.test(block)) continue;
    names.push(match[2].trim());
  }

  return names;
}

/**
 * Xcode's lastKnownFileType for a file name; "text" when unknown
 */
export function inferLastKnownFileType(fileName: string): string {
  const ext = path.extname(fileName).toLowerCase();
  return FILE_TYPES_BY_EXTENSION[ext] ?? 'text';
}

function extractIds(list: string): string[] {
  const ids: string[] = [];
  const idRegex = /([A-Fa-f0-9]{24})/g;
  let idMatch;
  while ((idMatch = idRegex.exec(list)) !== null) {
    ids.push(idMatch[1]);
  }
  return ids;
}

/**
 * Extract content between balanced braces, respecting quoted strings.
 * Starts from position after opening brace, returns content up to matching closing brace.
 */
function extractBalancedBlock(content: string, startPos: number): string | null {
  let depth = 1;
  let inQuote = false;
  let i = startPos;

  while (i < content.length && depth > 0) {
    const ch = content[i];
    if (ch === '"' && (i === 0 || content[i - 1] !== '\\')) {
      inQuote = !inQuote;
    } else if (!inQuote) {
      if (ch === '{') depth++;
      else if (ch === '}') depth--;
    }
    if (depth > 0) i++;
  }

  if (depth !== 0) return null;
  return content.substring(startPos, i);
}
