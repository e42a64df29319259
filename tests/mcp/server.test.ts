/**
 * Tests for the MCP server tools
 */
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { createMcpServer } from '../../src/mcp/server';

const FIXTURE = path.join(__dirname, '../fixtures/Sample.xcodeproj/project.pbxproj');

const FILE_REF_ID = 'AAAAAAAAAAAAAAAAAAAAAAAA';
const BUILD_FILE_ID = 'BBBBBBBBBBBBBBBBBBBBBBBB';

function textOf(result: CallToolResult): string {
  const first = result.content[0];
  if (first.type !== 'text') {
    throw new Error(`Expected text content, got ${first.type}`);
  }
  return first.text;
}

describe('MCP server', () => {
  let tempDir: string;
  let pbxprojPath: string;
  let original: string;
  let server: McpServer;
  let client: Client;

  async function callTool(name: string, args: Record<string, unknown>): Promise<CallToolResult> {
    return CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  }

  beforeEach(async () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pbxpatch-mcp-test-'));
    const xcodeproj = path.join(tempDir, 'Sample.xcodeproj');
    fs.mkdirSync(xcodeproj);
    pbxprojPath = path.join(xcodeproj, 'project.pbxproj');
    original = fs.readFileSync(FIXTURE, 'utf-8');
    fs.writeFileSync(pbxprojPath, original);

    server = createMcpServer();
    client = new Client({ name: 'pbxpatch-test', version: '0.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should list both tools', async () => {
    const { tools } = await client.listTools();

    expect(tools.map(t => t.name).sort()).toEqual(['pbxpatch_add_file', 'pbxpatch_check_anchors']);
  });

  describe('pbxpatch_add_file', () => {
    it('should add the file using the default group and return structured content', async () => {
      const result = await callTool('pbxpatch_add_file', {
        project: tempDir,
        filePath: 'Sample/Views/ProfileView.swift',
        fileRefId: FILE_REF_ID,
        buildFileId: BUILD_FILE_ID,
      });

      expect(result.isError).toBeFalsy();
      expect(result.structuredContent).toMatchObject({
        pbxprojPath,
        file: {
          name: 'ProfileView.swift',
          path: 'Sample/Views/ProfileView.swift',
          lastKnownFileType: 'sourcecode.swift',
        },
        ids: { fileRefId: FILE_REF_ID, buildFileId: BUILD_FILE_ID },
        written: true,
      });

      const written = fs.readFileSync(pbxprojPath, 'utf-8');
      expect(written).toContain(
        '/* Views */ = {\n\t\t\tisa = PBXGroup;\n\t\t\tchildren = (\n\t\t\t\tAAAAAAAAAAAAAAAAAAAAAAAA /* ProfileView.swift */,\n'
      );
      expect(written.split('\n').length).toBe(original.split('\n').length + 4);
    });

    it('should return an error result when strict and an anchor is missing', async () => {
      const result = await callTool('pbxpatch_add_file', {
        project: tempDir,
        filePath: 'Sample/Views/ProfileView.swift',
        groupName: 'Screens',
        strict: true,
      });

      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe('Anchors not found for: group. Project file left unchanged.');
      expect(fs.readFileSync(pbxprojPath, 'utf-8')).toBe(original);
    });

    it('should return an error result for an unknown target', async () => {
      const result = await callTool('pbxpatch_add_file', {
        project: tempDir,
        filePath: 'Sample/Views/ProfileView.swift',
        target: 'Widget',
      });

      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe(
        'No native target with a Sources build phase named "Widget". Available targets: Sample, SampleTests'
      );
      expect(fs.readFileSync(pbxprojPath, 'utf-8')).toBe(original);
    });

    it('should return an error result for a malformed ID', async () => {
      const result = await callTool('pbxpatch_add_file', {
        project: tempDir,
        filePath: 'Sample/Views/ProfileView.swift',
        buildFileId: 'not-an-id',
      });

      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe('Invalid record ID "not-an-id": expected 24 uppercase hexadecimal characters');
      expect(fs.readFileSync(pbxprojPath, 'utf-8')).toBe(original);
    });
  });

  describe('pbxpatch_check_anchors', () => {
    it('should report anchors and group names without writing', async () => {
      const result = await callTool('pbxpatch_check_anchors', { project: tempDir });

      expect(result.isError).toBeFalsy();
      expect(result.structuredContent).toMatchObject({
        pbxprojPath,
        groupNames: ['Sample', 'Views', 'SampleTests'],
      });
      expect(textOf(result)).toContain('"applied": true');
      expect(textOf(result)).not.toContain('"applied": false');
      expect(fs.readFileSync(pbxprojPath, 'utf-8')).toBe(original);
    });

    it('should report a missing group', async () => {
      const result = await callTool('pbxpatch_check_anchors', { project: tempDir, groupName: 'Screens' });

      expect(result.isError).toBeFalsy();
      expect(result.structuredContent).toMatchObject({
        sections: expect.arrayContaining([expect.objectContaining({ section: 'group', applied: false })]),
      });
    });

    it('should return an error result for an unknown target', async () => {
      const result = await callTool('pbxpatch_check_anchors', { project: tempDir, target: 'Widget' });

      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe(
        'No native target with a Sources build phase named "Widget". Available targets: Sample, SampleTests'
      );
    });
  });
});
