/**
 * pbxpatch command definitions
 */
import { Command } from 'commander';
import { addFileToProject, checkAnchors } from '../core/add-file.js';
import { DEFAULT_GROUP_NAME } from '../core/anchors.js';
import { format, formatAnchors, parseOutputFormat } from '../formatters/index.js';
import { startMcpServer } from '../mcp/server.js';
import packageJson from '../../package.json';

interface AddCommandOptions {
  project: string;
  group?: string;
  name?: string;
  target?: string;
  fileType?: string;
  fileRefId?: string;
  buildFileId?: string;
  dryRun: boolean;
  strict: boolean;
  format: string;
  verbose: boolean;
}

interface CheckCommandOptions {
  project: string;
  group?: string;
  target?: string;
  format: string;
  verbose: boolean;
}

/**
 * Build the pbxpatch command tree
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('pbxpatch')
    .description('Register source files in Xcode project.pbxproj files')
    .version(packageJson.version);

  program
    .command('add')
    .description('Add a source file to a group and to a target\'s Sources build phase')
    .argument('<file>', 'Path of the new file, relative to the project root')
    .option('-p, --project <path>', 'Path to project.pbxproj, .xcodeproj, or a directory containing one', '.')
    .option('-g, --group <name>', `PBXGroup that lists the file (default: "${DEFAULT_GROUP_NAME}")`)
    .option('-n, --name <name>', 'File name shown in Xcode (defaults to the basename)')
    .option('-t, --target <name>', 'Native target whose Sources phase compiles the file (defaults to the main app target)')
    .option('--file-type <type>', 'lastKnownFileType (inferred from the extension by default)')
    .option('--file-ref-id <id>', 'Use this PBXFileReference ID instead of a random one')
    .option('--build-file-id <id>', 'Use this PBXBuildFile ID instead of a random one')
    .option('--dry-run', 'Compute the patch without writing the project file', false)
    .option('--strict', 'Fail without writing if any anchor is missing', false)
    .option('-f, --format <format>', 'Output format: text, json', 'text')
    .option('-v, --verbose', 'Show verbose output', false)
    .action((file: string, options: AddCommandOptions) => {
      try {
        const outputFormat = parseOutputFormat(options.format);

        const result = addFileToProject({
          project: options.project,
          filePath: file,
          name: options.name,
          groupName: options.group,
          target: options.target,
          fileType: options.fileType,
          fileRefId: options.fileRefId,
          buildFileId: options.buildFileId,
          dryRun: options.dryRun,
          strict: options.strict,
        });

        console.log(format(result, outputFormat));

        if (options.verbose) {
          for (const outcome of result.sections) {
            console.error(`[${outcome.section}] /${outcome.anchor}/ ${outcome.applied ? `at ${outcome.offset}` : 'no match'}`);
          }
        }
      } catch (error) {
        reportError(error, options.verbose);
      }
    });

  program
    .command('check')
    .description('Report which insertion anchors a project has, without modifying it')
    .option('-p, --project <path>', 'Path to project.pbxproj, .xcodeproj, or a directory containing one', '.')
    .option('-g, --group <name>', `PBXGroup to look for (default: "${DEFAULT_GROUP_NAME}")`)
    .option('-t, --target <name>', 'Native target whose Sources phase to look for')
    .option('-f, --format <format>', 'Output format: text, json', 'text')
    .option('-v, --verbose', 'Show verbose output', false)
    .action((options: CheckCommandOptions) => {
      try {
        const outputFormat = parseOutputFormat(options.format);

        const report = checkAnchors({
          project: options.project,
          groupName: options.group,
          target: options.target,
        });

        console.log(formatAnchors(report, outputFormat));

        if (report.sections.some(s => !s.applied)) {
          process.exitCode = 1;
        }
      } catch (error) {
        reportError(error, options.verbose);
      }
    });

  program
    .command('mcp')
    .description('Start MCP (Model Context Protocol) server for AI agent integration')
    .action(async () => {
      try {
        await startMcpServer();
      } catch (error) {
        reportError(error, false);
      }
    });

  return program;
}

function reportError(error: unknown, verbose: boolean): never {
  if (error instanceof Error) {
    console.error(`Error: ${error.message}`);
    if (verbose) {
      console.error(error.stack);
    }
  } else {
    console.error('An unknown error occurred');
  }
  process.exit(1);
}
