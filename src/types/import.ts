export interface IssueRow {
  title: string;
  body: string;
  sourceRowIndex: number;  // 1-based sheet row
}

export type RowStage = 'create' | 'link';

export type RowState = 'linked' | 'failed' | 'skipped';

export interface RowOutcome {
  row: number;
  title: string;
  state: RowState;
  issueId?: string;
  itemId?: string;
  failedStage?: RowStage;
  error?: string;
}

export interface ImportOptions {
  token: string;
  file: string;
  project: string;
  owner: string;
  repo: string;
  endpoint: string;
  dryRun: boolean;
}
