import type { Settings } from '../config/settings.js';
import { createRepositoryClient } from '../github/client.js';
import { InvalidRepositoryUrlError } from '../github/errors.js';
import { resolveRepository } from '../github/repository.js';
import { GitHubVersionSource } from '../github/source.js';
import { loadVersionNotes } from '../notes/loader.js';
import { generateRunId, logger } from '../observability/logger.js';
import { NO_VERSION_DATA } from '../output/formatter.js';
import { generateVersionTable } from '../pipeline/orchestrator.js';
import type { NotesMap, RepoContext, VersionSource } from '../types.js';

export interface CliDependencies {
  createSource: (context: RepoContext, settings: Settings) => VersionSource;
  loadNotes: (notesFile: string) => Promise<NotesMap>;
}

const defaultDependencies: CliDependencies = {
  createSource: (context, settings) =>
    new GitHubVersionSource(createRepositoryClient(context, settings), context, {
      requestTimeoutMs: settings.requestTimeoutMs,
    }),
  loadNotes: loadVersionNotes,
};

export async function runCli(
  argv: readonly string[],
  settings: Settings,
  dependencies: CliDependencies = defaultDependencies
): Promise<string> {
  const repositoryUrl = argv[0] || settings.repositoryUrl;
  const runId = generateRunId();
  logger.setContext({ runId });

  try {
    logger.info('cli_start', `Generating version table for ${repositoryUrl}`);

    const context = resolveRepository(repositoryUrl);
    logger.setContext({ runId, owner: context.owner, repo: context.repo });
    logger.info('cli_repository', 'Resolved repository', {
      url: context.url,
      apiBaseUrl: context.apiBaseUrl,
    });

    const source = dependencies.createSource(context, settings);
    const notes = await dependencies.loadNotes(settings.notesFile);

    const result = await generateVersionTable(source, notes);
    return result.output;
  } catch (error) {
    if (error instanceof InvalidRepositoryUrlError) {
      logger.error('cli_repository', error.message, { url: error.url });
    } else {
      logger.error('cli_fatal', 'Unexpected error while generating version table', {
        error: error instanceof Error ? error.message : 'Unknown error',
        stack: error instanceof Error ? error.stack : undefined,
      });
    }
    return NO_VERSION_DATA;
  } finally {
    logger.clearContext();
  }
}
