import { TABLE_LIMITS } from '../config/settings.js';
import { isTrackedTag, normalizeRefName } from '../filters/refs.js';
import { DEFAULT_TRACKED_MODULES, hasVersionData, parseManifest } from '../manifest/parser.js';
import type { TrackedModules } from '../manifest/parser.js';
import { RunStats } from '../metrics/run-stats.js';
import type { RunStatsSnapshot } from '../metrics/run-stats.js';
import { logger } from '../observability/logger.js';
import { formatVersionTable } from '../output/formatter.js';
import type { NotesMap, RefCategory, VersionRecord, VersionSource } from '../types.js';

export interface TableOptions {
  mainBranch: string;
  maxReleases: number;
  maxTags: number;
  modules: TrackedModules;
}

export interface VersionTableResult {
  records: VersionRecord[];
  output: string;
  stats: RunStatsSnapshot;
}

const DEFAULT_OPTIONS: TableOptions = {
  mainBranch: TABLE_LIMITS.MAIN_BRANCH,
  maxReleases: TABLE_LIMITS.MAX_RELEASES,
  maxTags: TABLE_LIMITS.MAX_TAGS,
  modules: DEFAULT_TRACKED_MODULES,
};

interface RefEntry {
  name: string;
  category: RefCategory;
}

export async function generateVersionTable(
  source: VersionSource,
  notes: NotesMap,
  overrides: Partial<TableOptions> = {}
): Promise<VersionTableResult> {
  const options: TableOptions = { ...DEFAULT_OPTIONS, ...overrides };
  const stats = new RunStats();
  const records: VersionRecord[] = [];
  const processed = new Set<string>();

  logger.info('list_refs', 'Fetching branches, releases and tags');
  const branches = await source.listBranches();
  const releases = await source.listReleases();
  const tags = await source.listTags();
  stats.recordListing(branches.length, releases.length, tags.length);

  const collect = async (entry: RefEntry): Promise<void> => {
    logger.info('process_ref', `Processing ${entry.category} ${entry.name}`, {
      ref: entry.name,
      category: entry.category,
    });

    const content = await source.fetchManifest(entry.name);
    const versions = parseManifest(content, options.modules);
    const found = hasVersionData(versions);
    stats.recordProcessed();

    if (content === null) {
      stats.recordManifestOutcome('unavailable');
    } else if (!found) {
      stats.recordManifestOutcome('no_versions');
    }

    if (found) {
      const isBranch = entry.category === 'main' || entry.category === 'branch';
      records.push({
        ref: isBranch ? entry.name : normalizeRefName(entry.name),
        category: entry.category,
        golang: versions.golang || '',
        restApi: versions.restApi || '',
        sdkGo: versions.sdkGo || '',
        note: entry.category === 'main' ? '' : notes.get(entry.name) || '',
      });
      stats.recordEmitted();
    }

    processed.add(entry.name);
  };

  // Tried first even when the branch listing omits it.
  await collect({ name: options.mainBranch, category: 'main' });

  logger.info('process_branches', `Processing ${branches.length} branches`);
  for (const name of branches) {
    if (processed.has(name)) {
      stats.recordDuplicate();
      continue;
    }
    await collect({ name, category: 'branch' });
  }

  logger.info('process_releases', 'Processing releases');
  for (const name of releases.slice(0, options.maxReleases)) {
    if (processed.has(name)) {
      stats.recordDuplicate();
      continue;
    }
    await collect({ name, category: 'release' });
  }

  logger.info('process_tags', 'Processing tags');
  for (const name of tags.slice(0, options.maxTags)) {
    if (processed.has(name)) {
      stats.recordDuplicate();
      continue;
    }
    if (!isTrackedTag(name)) {
      stats.recordRejectedTag();
      continue;
    }
    await collect({ name, category: 'tag' });
  }

  const snapshot = stats.snapshot();
  logger.info('run_complete', 'Version table assembled', { ...snapshot });

  return {
    records,
    output: formatVersionTable(records),
    stats: snapshot,
  };
}
