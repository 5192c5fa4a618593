import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createProgram } from '../src/index.js';
import { logger } from '../src/utils/logger.js';

vi.mock('../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    dim: vi.fn(),
  },
  setLogLevel: vi.fn(),
}));

beforeEach(() => {
  vi.clearAllMocks();
  vi.stubEnv('GITHUB_TOKEN', '');
  vi.stubEnv('GH_TOKEN', '');
});

afterEach(() => {
  vi.unstubAllEnvs();
  process.exitCode = undefined;
});

describe('issue-sheet CLI', () => {
  it('should report every missing argument when run bare', async () => {
    await createProgram().parseAsync(['node', 'issue-sheet']);

    expect(logger.error).toHaveBeenCalledWith('Insufficient arguments: missing token, file, project, owner, repo');
    expect(process.exitCode).toBe(1);
  });

  it('should combine positionals and flags', async () => {
    await createProgram().parseAsync(['node', 'issue-sheet', 'test-token', '--project', 'Roadmap', '--repo', 'octo/widgets']);

    expect(logger.error).toHaveBeenCalledWith('Insufficient arguments: missing file');
  });
});
