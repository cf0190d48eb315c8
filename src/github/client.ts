import { Octokit } from '@octokit/rest';
import type { Settings } from '../config/settings.js';
import { logger } from '../observability/logger.js';
import type { RepoContext } from '../types.js';

export function createRepositoryClient(
  context: RepoContext,
  settings: Settings,
  requestFetch?: typeof fetch
): Octokit {
  return new Octokit({
    baseUrl: context.apiBaseUrl,
    auth: settings.githubToken,
    userAgent: 'version-table',
    request: requestFetch ? { fetch: requestFetch } : undefined,
    log: {
      debug: () => undefined,
      info: () => undefined,
      warn: (message: string) => logger.warn('octokit', message),
      error: (message: string) => logger.error('octokit', message),
    },
  });
}
