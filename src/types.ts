export type RefCategory = 'main' | 'branch' | 'release' | 'tag';

export interface RepoContext {
  url: string;
  owner: string;
  repo: string;
  apiBaseUrl: string;
}

export interface ManifestVersions {
  golang?: string;
  restApi?: string;
  sdkGo?: string;
}

export interface VersionRecord {
  readonly ref: string;
  readonly category: RefCategory;
  readonly golang: string;
  readonly restApi: string;
  readonly sdkGo: string;
  readonly note: string;
}

export type NotesMap = ReadonlyMap<string, string>;

export interface VersionSource {
  listBranches(): Promise<string[]>;
  listReleases(): Promise<string[]>;
  listTags(): Promise<string[]>;
  fetchManifest(ref: string): Promise<string | null>;
}
