export const DEFAULT_SETTINGS = {
  REPOSITORY_URL: 'https://github.com/redhat-cne/cloud-event-proxy',
  NOTES_FILE: 'version-notes.txt',
  REQUEST_TIMEOUT_MS: 30000,
} as const;

export const TABLE_LIMITS = {
  MAIN_BRANCH: 'main',
  BRANCH_PAGE_SIZE: 100,
  MAX_RELEASES: 10,
  MAX_TAGS: 20,
} as const;

export interface Settings {
  repositoryUrl: string;
  notesFile: string;
  requestTimeoutMs: number;
  githubToken?: string;
}

function parseTimeout(value: string | undefined): number {
  if (!value) return DEFAULT_SETTINGS.REQUEST_TIMEOUT_MS;

  const ms = parseInt(value, 10);
  if (isNaN(ms) || ms <= 0) return DEFAULT_SETTINGS.REQUEST_TIMEOUT_MS;
  return ms;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    repositoryUrl: env.VERSION_TABLE_REPOSITORY || DEFAULT_SETTINGS.REPOSITORY_URL,
    notesFile: env.VERSION_NOTES_FILE || DEFAULT_SETTINGS.NOTES_FILE,
    requestTimeoutMs: parseTimeout(env.VERSION_TABLE_TIMEOUT_MS),
    githubToken: env.GITHUB_TOKEN || undefined,
  };
}
