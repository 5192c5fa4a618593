import { NotFoundError, RowProcessingError, describeError } from './errors.js';
import { readIssueRows } from './spreadsheet.js';
import { logger } from '../utils/logger.js';
import type { ProjectBoardApi, RepositoryRef } from '../types/github.js';
import type { IssueRow, RowOutcome, RowStage } from '../types/import.js';

export interface UpdateOptions {
  dryRun?: boolean;
}

/**
 * Creates one issue per spreadsheet row in a repository and adds each
 * issue to a project board. Rows are processed one at a time, in order.
 */
export class ProjectUpdater {
  constructor(
    private readonly api: ProjectBoardApi,
    private readonly repository: RepositoryRef,
  ) {}

  get repositorySlug(): string {
    return `${this.repository.owner}/${this.repository.repo}`;
  }

  /**
   * Repository node ID, or null when the repository does not exist
   * or the token cannot see it. Other failures propagate.
   */
  async resolveRepositoryId(): Promise<string | null> {
    try {
      return await this.api.getRepositoryId(this.repository.owner, this.repository.repo);
    } catch (err) {
      if (err instanceof NotFoundError) {
        logger.error(`Repository '${this.repositorySlug}' not found.`);
        return null;
      }
      throw err;
    }
  }

  async resolveProjectId(projectName: string): Promise<string | null> {
    const projectId = await this.api.findProjectId(this.repository.owner, this.repository.repo, projectName);
    if (projectId === null) {
      logger.error(`Project '${projectName}' not found.`);
    } else {
      logger.debug(`Project '${projectName}' resolved to ${projectId}`);
    }
    return projectId;
  }

  async createIssue(repositoryId: string, title: string, body: string): Promise<string> {
    const issue = await this.api.createIssue(repositoryId, title, body);
    logger.success(`Created issue #${issue.number}: ${title}`);
    return issue.id;
  }

  async addItemToProject(projectId: string, contentId: string): Promise<string> {
    const itemId = await this.api.addProjectV2ItemById(projectId, contentId);
    logger.success(`Item added to project. Item ID: ${itemId}`);
    return itemId;
  }

  /**
   * Run the batch. A repository that cannot be resolved aborts the run
   * before any row is touched; a failing row is logged and skipped.
   */
  async updateFromSpreadsheet(path: string, projectId: string, options: UpdateOptions = {}): Promise<RowOutcome[]> {
    if (options.dryRun) {
      const rows = await readIssueRows(path);
      for (const row of rows) {
        logger.dim(`[dry-run] row ${row.sourceRowIndex}: ${row.title}`);
      }
      return rows.map((row): RowOutcome => ({ row: row.sourceRowIndex, title: row.title, state: 'skipped' }));
    }

    const repositoryId = await this.resolveRepositoryId();
    if (repositoryId === null) {
      throw new NotFoundError(`Repository '${this.repositorySlug}' not found`);
    }

    const rows = await readIssueRows(path);
    logger.info(`Processing ${rows.length} row(s) from ${path}`);

    const outcomes: RowOutcome[] = [];
    for (const row of rows) {
      outcomes.push(await this.processRow(row, repositoryId, projectId));
    }
    return outcomes;
  }

  private async processRow(row: IssueRow, repositoryId: string, projectId: string): Promise<RowOutcome> {
    let issueId: string;
    try {
      issueId = await this.createIssue(repositoryId, row.title, row.body);
    } catch (err) {
      return this.failRow(row, 'create', err);
    }

    try {
      const itemId = await this.addItemToProject(projectId, issueId);
      return { row: row.sourceRowIndex, title: row.title, state: 'linked', issueId, itemId };
    } catch (err) {
      // The issue stays in the repository without a project item.
      return this.failRow(row, 'link', err, issueId);
    }
  }

  private failRow(row: IssueRow, stage: RowStage, cause: unknown, issueId?: string): RowOutcome {
    const failure = new RowProcessingError(row.sourceRowIndex, stage, cause);
    logger.error(failure.message);
    return {
      row: row.sourceRowIndex,
      title: row.title,
      state: 'failed',
      failedStage: stage,
      issueId,
      error: describeError(cause),
    };
  }
}
