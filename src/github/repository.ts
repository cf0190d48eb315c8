import { RepoContext } from '../types.js';
import { InvalidRepositoryUrlError } from './errors.js';

const PUBLIC_HOST = 'github.com';
const PUBLIC_API_URL = 'https://api.github.com';

export function resolveRepository(url: string): RepoContext {
  const trimmed = url.trim().replace(/\/+$/, '');
  if (!trimmed) {
    throw new InvalidRepositoryUrlError(url, 'empty URL');
  }

  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(withScheme);
  } catch {
    throw new InvalidRepositoryUrlError(url, 'not a URL');
  }

  const segments = parsed.pathname.split('/').filter(segment => segment.length > 0);
  if (segments.length < 2) {
    throw new InvalidRepositoryUrlError(url, 'expected host/owner/name');
  }

  const owner = segments[0];
  const repo = segments[1].replace(/\.git$/, '');

  const apiBaseUrl = parsed.hostname === PUBLIC_HOST
    ? PUBLIC_API_URL
    : `${parsed.origin}/api/v3`;

  return { url: trimmed, owner, repo, apiBaseUrl };
}
