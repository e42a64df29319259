/**
 * Tests for project.pbxproj discovery
 */
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { resolvePbxprojPath } from '../../src/core/project-locator';
import { AmbiguousProjectError, ProjectNotFoundError } from '../../src/core/errors';

function createProject(dir: string, name: string): string {
  const xcodeproj = path.join(dir, `${name}.xcodeproj`);
  fs.mkdirSync(xcodeproj, { recursive: true });
  const pbxproj = path.join(xcodeproj, 'project.pbxproj');
  fs.writeFileSync(pbxproj, '// !$*UTF8*$!\n{\n}\n');
  return pbxproj;
}

describe('resolvePbxprojPath', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pbxpatch-locator-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should accept the project.pbxproj itself', () => {
    const pbxproj = createProject(tempDir, 'MyApp');
    expect(resolvePbxprojPath(pbxproj)).toBe(pbxproj);
  });

  it('should accept an .xcodeproj bundle', () => {
    const pbxproj = createProject(tempDir, 'MyApp');
    expect(resolvePbxprojPath(path.join(tempDir, 'MyApp.xcodeproj'))).toBe(pbxproj);
  });

  it('should accept an .xcodeproj bundle with a trailing slash', () => {
    const pbxproj = createProject(tempDir, 'MyApp');
    expect(resolvePbxprojPath(path.join(tempDir, 'MyApp.xcodeproj') + '/')).toBe(pbxproj);
  });

  it('should resolve a relative path against the working directory', () => {
    const pbxproj = createProject(tempDir, 'MyApp');
    const relative = path.relative(process.cwd(), path.join(tempDir, 'MyApp.xcodeproj'));
    expect(resolvePbxprojPath(relative)).toBe(pbxproj);
  });

  it('should find the single .xcodeproj in a directory', () => {
    const pbxproj = createProject(tempDir, 'MyApp');
    fs.mkdirSync(path.join(tempDir, 'MyApp'));
    expect(resolvePbxprojPath(tempDir)).toBe(pbxproj);
  });

  it('should reject a directory with several projects', () => {
    createProject(tempDir, 'Beta');
    createProject(tempDir, 'Alpha');

    expect(() => resolvePbxprojPath(tempDir)).toThrow(AmbiguousProjectError);
    try {
      resolvePbxprojPath(tempDir);
    } catch (error) {
      expect(error).toBeInstanceOf(AmbiguousProjectError);
      if (error instanceof AmbiguousProjectError) {
        expect(error.candidates).toEqual(['Alpha.xcodeproj', 'Beta.xcodeproj']);
      }
    }
  });

  it('should reject a directory without a project', () => {
    expect(() => resolvePbxprojPath(tempDir)).toThrow(ProjectNotFoundError);
  });

  it('should reject an .xcodeproj without project.pbxproj', () => {
    const xcodeproj = path.join(tempDir, 'Empty.xcodeproj');
    fs.mkdirSync(xcodeproj);
    expect(() => resolvePbxprojPath(xcodeproj)).toThrow(ProjectNotFoundError);
  });

  it('should reject a path that does not exist', () => {
    expect(() => resolvePbxprojPath(path.join(tempDir, 'missing'))).toThrow(
      `No Xcode project found at ${path.join(tempDir, 'missing')}`
    );
  });

  it('should reject a file that is not project.pbxproj', () => {
    const other = path.join(tempDir, 'Info.plist');
    fs.writeFileSync(other, '<plist/>');
    expect(() => resolvePbxprojPath(other)).toThrow(ProjectNotFoundError);
  });
});
