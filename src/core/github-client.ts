import { graphql } from '@octokit/graphql';
import { z } from 'zod';
import { DEFAULT_API_URL } from '../constants.js';
import { NotFoundError, ResponseShapeError, toGitHubError } from './errors.js';
import { logger } from '../utils/logger.js';
import type { CreatedIssue, ProjectBoardApi } from '../types/github.js';

/**
 * Sends one GraphQL document and resolves with its `data`.
 * Rejects on HTTP failure and on any response carrying an `errors` array.
 */
export type GraphQLExecutor = (query: string, variables: Record<string, unknown>) => Promise<unknown>;

export interface ExecutorOptions {
  token: string;
  baseUrl?: string;
  fetch?: typeof fetch;
}

export function createGraphQLExecutor(options: ExecutorOptions): GraphQLExecutor {
  const client = graphql.defaults({
    baseUrl: options.baseUrl ?? DEFAULT_API_URL,
    headers: {
      authorization: `bearer ${options.token}`,
    },
    request: options.fetch ? { fetch: options.fetch } : {},
  });
  return (query, variables) => client<unknown>(query, { ...variables });
}

const REPOSITORY_ID_QUERY = `
  query($owner: String!, $name: String!) {
    repository(owner: $owner, name: $name) { id }
  }
`;

const PROJECT_ID_QUERY = `
  query($owner: String!, $name: String!, $projectName: String!) {
    repository(owner: $owner, name: $name) {
      projectsV2(query: $projectName, first: 1) {
        nodes { id }
      }
    }
  }
`;

const CREATE_ISSUE_MUTATION = `
  mutation($repositoryId: ID!, $title: String!, $body: String!) {
    createIssue(input: { repositoryId: $repositoryId, title: $title, body: $body }) {
      issue {
        id
        number
        url
      }
    }
  }
`;

const ADD_PROJECT_ITEM_MUTATION = `
  mutation($projectId: ID!, $contentId: ID!) {
    addProjectV2ItemById(input: { projectId: $projectId, contentId: $contentId }) {
      item { id }
    }
  }
`;

const RepositoryIdResponse = z.object({
  repository: z.object({ id: z.string() }).nullable(),
});

const ProjectIdResponse = z.object({
  repository: z
    .object({
      projectsV2: z.object({
        nodes: z.array(z.object({ id: z.string() }).nullable()),
      }),
    })
    .nullable(),
});

const CreateIssueResponse = z.object({
  createIssue: z.object({
    issue: z.object({
      id: z.string(),
      number: z.number(),
      url: z.string(),
    }),
  }),
});

const AddProjectItemResponse = z.object({
  addProjectV2ItemById: z.object({
    item: z.object({ id: z.string() }),
  }),
});

export function parseResponse<S extends z.ZodTypeAny>(schema: S, data: unknown, operation: string): z.infer<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const detail = issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : result.error.message;
    throw new ResponseShapeError(operation, detail);
  }
  return result.data;
}

/**
 * GitHub GraphQL client for the four operations the importer needs.
 * Every response is checked against a schema before a field is read.
 */
export class GitHubClient implements ProjectBoardApi {
  constructor(private readonly execute: GraphQLExecutor) {}

  static fromToken(options: ExecutorOptions): GitHubClient {
    return new GitHubClient(createGraphQLExecutor(options));
  }

  async getRepositoryId(owner: string, name: string): Promise<string> {
    const data = await this.send('Get repository ID', REPOSITORY_ID_QUERY, { owner, name }, RepositoryIdResponse);
    if (!data.repository) {
      throw new NotFoundError(`Repository '${owner}/${name}' not found`);
    }
    return data.repository.id;
  }

  /**
   * First project whose name matches `projectName`, or null when none does.
   * Several matches are not disambiguated; GitHub's ordering decides.
   */
  async findProjectId(owner: string, repoName: string, projectName: string): Promise<string | null> {
    const data = await this.send(
      'Get project ID',
      PROJECT_ID_QUERY,
      { owner, name: repoName, projectName },
      ProjectIdResponse,
    );
    if (!data.repository) {
      throw new NotFoundError(`Repository '${owner}/${repoName}' not found`);
    }
    const first = data.repository.projectsV2.nodes.find(node => node !== null);
    return first ? first.id : null;
  }

  async createIssue(repositoryId: string, title: string, body: string): Promise<CreatedIssue> {
    const data = await this.send('Create issue', CREATE_ISSUE_MUTATION, { repositoryId, title, body }, CreateIssueResponse);
    return data.createIssue.issue;
  }

  /**
   * Add an existing issue to a Project V2 and return the project item ID.
   * Adding the same issue twice is not guarded against.
   */
  async addProjectV2ItemById(projectId: string, contentId: string): Promise<string> {
    const data = await this.send(
      'Add item to project',
      ADD_PROJECT_ITEM_MUTATION,
      { projectId, contentId },
      AddProjectItemResponse,
    );
    return data.addProjectV2ItemById.item.id;
  }

  private async send<S extends z.ZodTypeAny>(
    operation: string,
    query: string,
    variables: Record<string, unknown>,
    schema: S,
  ): Promise<z.infer<S>> {
    logger.debug(`${operation}: ${Object.keys(variables).join(', ')}`);
    let data: unknown;
    try {
      data = await this.execute(query, variables);
    } catch (err) {
      throw toGitHubError(err, operation);
    }
    return parseResponse(schema, data, operation);
  }
}
