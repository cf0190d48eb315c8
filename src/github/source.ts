import { Octokit } from '@octokit/rest';
import { TABLE_LIMITS } from '../config/settings.js';
import { logger } from '../observability/logger.js';
import type { RepoContext, VersionSource } from '../types.js';

const MANIFEST_PATH = 'go.mod';

export interface SourceOptions {
  requestTimeoutMs: number;
  branchPageSize?: number;
}

/**
 * Reads ref listings and go.mod contents from the GitHub REST API.
 *
 * Failures never propagate: a failed listing yields an empty list and a failed
 * manifest lookup yields null, each with a logged diagnostic.
 */
export class GitHubVersionSource implements VersionSource {
  private readonly branchPageSize: number;

  constructor(
    private readonly octokit: Octokit,
    private readonly context: RepoContext,
    private readonly options: SourceOptions
  ) {
    this.branchPageSize = options.branchPageSize ?? TABLE_LIMITS.BRANCH_PAGE_SIZE;
  }

  private requestOptions() {
    return { signal: AbortSignal.timeout(this.options.requestTimeoutMs) };
  }

  async listBranches(): Promise<string[]> {
    const names: string[] = [];
    let page = 1;

    try {
      while (true) {
        const { data: branches } = await this.octokit.repos.listBranches({
          owner: this.context.owner,
          repo: this.context.repo,
          per_page: this.branchPageSize,
          page,
          request: this.requestOptions(),
        });

        if (branches.length === 0) break;

        names.push(...branches.map(branch => branch.name));
        page++;
      }

      return names;
    } catch (error) {
      logger.error('list_branches', 'Error fetching branches', {
        page,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      return [];
    }
  }

  async listReleases(): Promise<string[]> {
    try {
      const { data: releases } = await this.octokit.repos.listReleases({
        owner: this.context.owner,
        repo: this.context.repo,
        request: this.requestOptions(),
      });

      return releases.map(release => release.tag_name);
    } catch (error) {
      logger.error('list_releases', 'Error fetching releases', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      return [];
    }
  }

  async listTags(): Promise<string[]> {
    try {
      const { data: tags } = await this.octokit.repos.listTags({
        owner: this.context.owner,
        repo: this.context.repo,
        request: this.requestOptions(),
      });

      return tags.map(tag => tag.name);
    } catch (error) {
      logger.error('list_tags', 'Error fetching tags', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      return [];
    }
  }

  async fetchManifest(ref: string): Promise<string | null> {
    try {
      const { data } = await this.octokit.repos.getContent({
        owner: this.context.owner,
        repo: this.context.repo,
        path: MANIFEST_PATH,
        ref,
        request: this.requestOptions(),
      });

      if (Array.isArray(data) || data.type !== 'file' || !('content' in data)) {
        logger.warn('fetch_manifest', `${MANIFEST_PATH} is not a file`, { ref });
        return null;
      }

      if (data.encoding === 'base64') {
        return Buffer.from(data.content, 'base64').toString('utf-8');
      }
      return data.content;
    } catch (error) {
      logger.error('fetch_manifest', `Error fetching ${MANIFEST_PATH}`, {
        ref,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      return null;
    }
  }
}
