// Default GitHub API base URL; the GraphQL endpoint is `${base}/graphql`
export const DEFAULT_API_URL = 'https://api.github.com';

// Environment variables consulted when a CLI option is absent
export const TOKEN_ENV_VARS = ['GITHUB_TOKEN', 'GH_TOKEN'] as const;
export const API_URL_ENV_VAR = 'GITHUB_API_URL';

// Sheet layout: row 1 is the header, column A the title, column B the body
export const HEADER_ROW = 1;
export const TITLE_COLUMN = 1;
export const BODY_COLUMN = 2;

export const SUPPORTED_EXTENSIONS = ['.xlsx', '.csv'] as const;
