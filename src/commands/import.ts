import { existsSync } from 'node:fs';
import { GitHubClient } from '../core/github-client.js';
import { ProjectUpdater } from '../core/project-updater.js';
import { describeError } from '../core/errors.js';
import { API_URL_ENV_VAR, DEFAULT_API_URL, TOKEN_ENV_VARS } from '../constants.js';
import { logger, setLogLevel } from '../utils/logger.js';
import type { ProjectBoardApi } from '../types/github.js';
import type { ImportOptions } from '../types/import.js';

export interface ImportCommandInput {
  // token, file, project, owner, repo, in that order
  positionals: Array<string | undefined>;
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

export type ResolvedImportOptions =
  | { ok: true; options: ImportOptions }
  | { ok: false; missing: string[] };

export interface ImportDependencies {
  createApi(options: ImportOptions): ProjectBoardApi;
}

const defaultDependencies: ImportDependencies = {
  createApi: options => GitHubClient.fromToken({ token: options.token, baseUrl: options.endpoint }),
};

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  return values.find(value => value !== undefined && value.trim() !== '');
}

/**
 * Merge flags, positionals and environment into the options for one run.
 * A flag wins over a positional; the environment is consulted last.
 */
export function resolveImportOptions(
  input: ImportCommandInput,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedImportOptions {
  const [posToken, posFile, posProject, posOwner, posRepo] = input.positionals;

  const token = firstNonEmpty(input.token, posToken, ...TOKEN_ENV_VARS.map(name => env[name]));
  const file = firstNonEmpty(input.file, posFile);
  const project = firstNonEmpty(input.project, posProject);
  let owner = firstNonEmpty(input.owner, posOwner);
  let repo = firstNonEmpty(input.repo, posRepo);

  // --repo owner/name
  if (repo && repo.includes('/')) {
    const [repoOwner, repoName] = repo.split('/', 2);
    owner = owner ?? firstNonEmpty(repoOwner);
    repo = firstNonEmpty(repoName);
  }

  const missing: string[] = [];
  if (!token) missing.push('token');
  if (!file) missing.push('file');
  if (!project) missing.push('project');
  if (!owner) missing.push('owner');
  if (!repo) missing.push('repo');

  if (!token || !file || !project || !owner || !repo) {
    return { ok: false, missing };
  }

  return {
    ok: true,
    options: {
      token,
      file,
      project,
      owner,
      repo,
      endpoint: firstNonEmpty(input.endpoint, env[API_URL_ENV_VAR]) ?? DEFAULT_API_URL,
      dryRun: input.dryRun ?? false,
    },
  };
}

export async function importCommand(
  input: ImportCommandInput,
  deps: ImportDependencies = defaultDependencies,
): Promise<void> {
  setLogLevel(input.quiet ? 'quiet' : input.verbose ? 'verbose' : 'normal');

  const resolved = resolveImportOptions(input);
  if (!resolved.ok) {
    logger.error(`Insufficient arguments: missing ${resolved.missing.join(', ')}`);
    logger.dim('Usage: issue-sheet <token> <file> <project> <owner> <repo>');
    process.exitCode = 1;
    return;
  }
  const options = resolved.options;

  if (!existsSync(options.file)) {
    logger.error(`Spreadsheet not found: ${options.file}`);
    process.exitCode = 1;
    return;
  }

  const updater = new ProjectUpdater(deps.createApi(options), { owner: options.owner, repo: options.repo });
  logger.info(`Repository: ${updater.repositorySlug}`);
  if (options.dryRun) {
    logger.warn('Dry run mode - no issues will be created.');
  }

  try {
    const projectId = await updater.resolveProjectId(options.project);
    if (projectId === null) {
      process.exitCode = 1;
      return;
    }

    await updater.updateFromSpreadsheet(options.file, projectId, { dryRun: options.dryRun });
    logger.info('Finished.');
  } catch (err) {
    logger.error(describeError(err));
    process.exitCode = 1;
  }
}
