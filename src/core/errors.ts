import { GraphqlResponseError } from '@octokit/graphql';
import { RequestError } from '@octokit/request-error';
import type { RowStage } from '../types/import.js';

/**
 * Base class for every failure this tool reports by kind.
 */
export class IssueSheetError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The token is missing or GitHub rejected it. */
export class AuthError extends IssueSheetError {}

/** The repository or project does not exist, or the token cannot see it. */
export class NotFoundError extends IssueSheetError {}

/** The request never produced a usable HTTP response, or the status was not 2xx. */
export class TransportError extends IssueSheetError {
  constructor(message: string, readonly status?: number, options?: ErrorOptions) {
    super(message, options);
  }
}

/** A well-formed response that carried an `errors` array. */
export class GraphQLError extends IssueSheetError {
  constructor(readonly operation: string, readonly messages: string[], options?: ErrorOptions) {
    super(`${operation}: ${messages.join(', ')}`, options);
  }
}

/** A 2xx response whose data did not have the fields the operation reads. */
export class ResponseShapeError extends IssueSheetError {
  constructor(readonly operation: string, detail: string) {
    super(`${operation}: unexpected response shape (${detail})`);
  }
}

/** Any failure scoped to a single spreadsheet row. */
export class RowProcessingError extends IssueSheetError {
  constructor(readonly row: number, readonly stage: RowStage, cause: unknown) {
    super(`Error processing row ${row}: ${describeError(cause)}`, { cause });
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Map whatever the GraphQL transport threw onto the error kinds above.
 */
export function toGitHubError(err: unknown, operation: string): IssueSheetError {
  if (err instanceof IssueSheetError) return err;

  if (err instanceof GraphqlResponseError) {
    const errors: Array<{ type: string; message: string }> = err.errors ?? [];
    const messages = errors.map(e => e.message);
    if (errors.length > 0 && errors.every(e => e.type === 'NOT_FOUND')) {
      return new NotFoundError(messages.join(', '), { cause: err });
    }
    return new GraphQLError(operation, messages.length > 0 ? messages : [err.message], { cause: err });
  }

  if (err instanceof RequestError) {
    if (err.status === 401) {
      return new AuthError(`${operation}: GitHub rejected the token (${err.message})`, { cause: err });
    }
    // No response: the request never reached GitHub, whatever status octokit assigned.
    if (err.response === undefined) {
      return new TransportError(`${operation}: ${err.message}`, undefined, { cause: err });
    }
    return new TransportError(`${operation}: HTTP ${err.status} ${err.message}`, err.status, { cause: err });
  }

  return new TransportError(`${operation}: ${describeError(err)}`, undefined, { cause: err });
}
