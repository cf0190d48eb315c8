import { ManifestVersions } from '../types.js';

export interface TrackedModules {
  restApi: string;
  sdkGo: string;
}

export const DEFAULT_TRACKED_MODULES: TrackedModules = {
  restApi: 'github.com/redhat-cne/rest-api',
  sdkGo: 'github.com/redhat-cne/sdk-go',
};

const GO_DIRECTIVE = /^go\s+(\d+\.\d+(?:\.\d+)?)/m;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function modulePattern(modulePath: string): RegExp {
  return new RegExp(`${escapeRegExp(modulePath)}\\s+(v[\\d.]+)`);
}

export function parseManifest(
  content: string | null,
  modules: TrackedModules = DEFAULT_TRACKED_MODULES
): ManifestVersions {
  if (!content) {
    return {};
  }

  const versions: ManifestVersions = {};

  const goMatch = content.match(GO_DIRECTIVE);
  if (goMatch) versions.golang = goMatch[1];

  const restApiMatch = content.match(modulePattern(modules.restApi));
  if (restApiMatch) versions.restApi = restApiMatch[1];

  const sdkGoMatch = content.match(modulePattern(modules.sdkGo));
  if (sdkGoMatch) versions.sdkGo = sdkGoMatch[1];

  return versions;
}

export function hasVersionData(versions: ManifestVersions): boolean {
  return Boolean(versions.golang || versions.restApi || versions.sdkGo);
}
