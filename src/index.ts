import { Command } from 'commander';
import { importCommand } from './commands/import.js';

export { GitHubClient, createGraphQLExecutor } from './core/github-client.js';
export type { GraphQLExecutor, ExecutorOptions } from './core/github-client.js';
export { ProjectUpdater } from './core/project-updater.js';
export { readIssueRows } from './core/spreadsheet.js';
export * from './core/errors.js';
export type { ProjectBoardApi, RepositoryRef, CreatedIssue } from './types/github.js';
export type { IssueRow, RowOutcome } from './types/import.js';

interface CliOptions {
  token?: string;
  file?: string;
  project?: string;
  owner?: string;
  repo?: string;
  endpoint?: string;
  dryRun?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('issue-sheet')
    .description('Create GitHub issues from spreadsheet rows and add them to a GitHub Project')
    .version('0.1.0')
    .argument('[token]', 'GitHub token (or set GITHUB_TOKEN / GH_TOKEN)')
    .argument('[file]', 'Spreadsheet with a header row, titles in column A and bodies in column B (.xlsx or .csv)')
    .argument('[project]', 'Project name to add the issues to')
    .argument('[owner]', 'Repository owner')
    .argument('[repo]', 'Repository name')
    .option('--token <token>', 'GitHub token')
    .option('--file <path>', 'Spreadsheet path')
    .option('--project <name>', 'Project name')
    .option('--owner <owner>', 'Repository owner')
    .option('--repo <repo>', 'Repository name, or owner/name')
    .option('--endpoint <url>', 'GitHub API base URL (default: https://api.github.com)')
    .option('--dry-run', 'Read the spreadsheet and resolve the project without creating issues')
    .option('--verbose', 'Log every GraphQL operation')
    .option('--quiet', 'Only print errors')
    .action(async (
      token: string | undefined,
      file: string | undefined,
      project: string | undefined,
      owner: string | undefined,
      repo: string | undefined,
      opts: CliOptions,
    ) => {
      await importCommand({ positionals: [token, file, project, owner, repo], ...opts });
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}
