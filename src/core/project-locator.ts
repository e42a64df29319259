/**
 * Resolve a user-supplied path to the project.pbxproj it refers to
 *
 * Accepts the pbxproj itself, an .xcodeproj bundle, or a directory that
 * contains exactly one .xcodeproj.
 */
import * as fs from 'fs';
import * as path from 'path';
import { AmbiguousProjectError, ProjectNotFoundError } from './errors.js';

const PBXPROJ_FILE = 'project.pbxproj';

export function resolvePbxprojPath(inputPath: string): string {
  // Drops trailing separators left by shell completion ("App.xcodeproj/")
  const resolved = path.resolve(inputPath);

  if (!fs.existsSync(resolved)) {
    throw new ProjectNotFoundError(inputPath);
  }

  const stat = fs.statSync(resolved);

  if (stat.isFile()) {
    if (path.basename(resolved) === PBXPROJ_FILE) {
      return resolved;
    }
    throw new ProjectNotFoundError(inputPath);
  }

  if (resolved.endsWith('.xcodeproj')) {
    return pbxprojInside(resolved);
  }

  const projects = fs.readdirSync(resolved)
    .filter(entry => entry.endsWith('.xcodeproj'))
    .sort();

  if (projects.length === 0) {
    throw new ProjectNotFoundError(inputPath);
  }
  if (projects.length > 1) {
    throw new AmbiguousProjectError(inputPath, projects);
  }

  return pbxprojInside(path.join(resolved, projects[0]));
}

function pbxprojInside(xcodeprojPath: string): string {
  const pbxprojPath = path.join(xcodeprojPath, PBXPROJ_FILE);
  if (!fs.existsSync(pbxprojPath)) {
    throw new ProjectNotFoundError(xcodeprojPath);
  }
  return pbxprojPath;
}
