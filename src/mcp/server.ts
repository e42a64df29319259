/**
 * pbxpatch MCP Server
 *
 * Exposes pbxpatch via the Model Context Protocol (MCP) over stdio, so agents
 * that create Swift files can register them in the Xcode project.
 */
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { addFileToProject, checkAnchors } from '../core/add-file.js';
import { DEFAULT_GROUP_NAME } from '../core/anchors.js';
import {
  AmbiguousProjectError,
  IncompleteAnchorsError,
  InvalidRecordIdError,
  ProjectNotFoundError,
  TargetNotFoundError,
} from '../core/errors.js';
import { AnchorSection } from '../types/index.js';
import packageJson from '../../package.json';

const sectionOutcomeSchema = z.object({
  section: z.nativeEnum(AnchorSection),
  anchor: z.string(),
  applied: z.boolean(),
  offset: z.number().optional(),
});

/**
 * Errors that are reported to the agent instead of failing the call
 */
function isKnownError(error: unknown): error is Error {
  return error instanceof ProjectNotFoundError
    || error instanceof AmbiguousProjectError
    || error instanceof TargetNotFoundError
    || error instanceof IncompleteAnchorsError
    || error instanceof InvalidRecordIdError;
}

function errorResult(error: Error) {
  return {
    content: [
      {
        type: 'text' as const,
        text: error.message,
      },
    ],
    isError: true,
  };
}

/**
 * Create and configure the MCP server
 */
export function createMcpServer(): McpServer {
  const server = new McpServer(
    {
      name: 'pbxpatch',
      version: packageJson.version,
    },
    {
      capabilities: {
        tools: {},
      },
      instructions: 'pbxpatch registers new source files in Xcode projects. ' +
        'Use pbxpatch_check_anchors to see whether a project can be patched, ' +
        'then pbxpatch_add_file after writing a new file to disk.',
    }
  );

  // Tool: pbxpatch_add_file
  server.registerTool(
    'pbxpatch_add_file',
    {
      description: 'Add a file to an Xcode project: PBXBuildFile and PBXFileReference records, ' +
        'an entry in a PBXGroup, and an entry in a target\'s Sources build phase.',
      inputSchema: {
        project: z.string().describe('Path to project.pbxproj, an .xcodeproj, or a directory containing one'),
        filePath: z.string().describe('Path of the new file relative to the project root'),
        name: z.string().optional().describe('File name shown in Xcode; defaults to the basename'),
        groupName: z.string().optional().describe(`PBXGroup that lists the file (default "${DEFAULT_GROUP_NAME}")`),
        target: z.string().optional().describe('Native target whose Sources phase compiles the file'),
        fileType: z.string().optional().describe('lastKnownFileType; inferred from the extension when omitted'),
        fileRefId: z.string().optional().describe('PBXFileReference ID (24 uppercase hex characters); random when omitted'),
        buildFileId: z.string().optional().describe('PBXBuildFile ID (24 uppercase hex characters); random when omitted'),
        dryRun: z.boolean().optional().describe('Compute the patch without writing'),
        strict: z.boolean().optional().describe('Fail without writing if any anchor is missing'),
      },
      outputSchema: {
        pbxprojPath: z.string(),
        file: z.object({
          name: z.string(),
          path: z.string(),
          lastKnownFileType: z.string().optional(),
        }),
        ids: z.object({
          fileRefId: z.string(),
          buildFileId: z.string(),
        }),
        sections: z.array(sectionOutcomeSchema),
        written: z.boolean(),
      },
    },
    async ({ project, filePath, name, groupName, target, fileType, fileRefId, buildFileId, dryRun, strict }) => {
      try {
        const result = addFileToProject({
          project,
          filePath,
          name,
          groupName,
          target,
          fileType,
          fileRefId,
          buildFileId,
          dryRun,
          strict,
        });

        const structuredContent = {
          pbxprojPath: result.pbxprojPath,
          file: result.file,
          ids: result.ids,
          sections: result.sections,
          written: result.written,
        };

        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify(structuredContent, null, 2),
            },
          ],
          structuredContent,
        };
      } catch (error) {
        if (isKnownError(error)) {
          return errorResult(error);
        }
        throw error;
      }
    }
  );

  // Tool: pbxpatch_check_anchors
  server.registerTool(
    'pbxpatch_check_anchors',
    {
      description: 'Report which insertion anchors an Xcode project has, without modifying it.',
      inputSchema: {
        project: z.string().describe('Path to project.pbxproj, an .xcodeproj, or a directory containing one'),
        groupName: z.string().optional().describe(`PBXGroup to look for (default "${DEFAULT_GROUP_NAME}")`),
        target: z.string().optional().describe('Native target whose Sources phase to look for'),
      },
      outputSchema: {
        pbxprojPath: z.string(),
        sections: z.array(sectionOutcomeSchema),
        groupNames: z.array(z.string()),
      },
    },
    async ({ project, groupName, target }) => {
      try {
        const report = checkAnchors({ project, groupName, target });

        const structuredContent = {
          pbxprojPath: report.pbxprojPath,
          sections: report.sections,
          groupNames: report.groupNames,
        };

        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify(structuredContent, null, 2),
            },
          ],
          structuredContent,
        };
      } catch (error) {
        if (isKnownError(error)) {
          return errorResult(error);
        }
        throw error;
      }
    }
  );

  return server;
}

/**
 * Start the MCP server with stdio transport
 */
export async function startMcpServer(): Promise<void> {
  const server = createMcpServer();
  const transport = new StdioServerTransport();

  await server.connect(transport);

  // Log to stderr so it doesn't interfere with MCP protocol on stdout
  console.error(`pbxpatch MCP server v${packageJson.version} running on stdio`);
}
