export interface RepositoryRef {
  owner: string;
  repo: string;
}

export interface CreatedIssue {
  id: string;
  number: number;
  url: string;
}

/**
 * The subset of the GitHub GraphQL API the importer talks to.
 * `GitHubClient` implements it; tests substitute a fake.
 */
export interface ProjectBoardApi {
  getRepositoryId(owner: string, name: string): Promise<string>;
  findProjectId(owner: string, repoName: string, projectName: string): Promise<string | null>;
  createIssue(repositoryId: string, title: string, body: string): Promise<CreatedIssue>;
  addProjectV2ItemById(projectId: string, contentId: string): Promise<string>;
}
