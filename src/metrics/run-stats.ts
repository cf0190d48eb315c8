export interface RunStatsSnapshot {
  listed: {
    branches: number;
    releases: number;
    tags: number;
  };
  refsProcessed: number;
  recordsEmitted: number;
  duplicatesSkipped: number;
  tagsRejected: number;
  manifestsUnavailable: number;
  manifestsWithoutVersions: number;
}

export class RunStats {
  private counters = {
    branchesListed: 0,
    releasesListed: 0,
    tagsListed: 0,
    refsProcessed: 0,
    recordsEmitted: 0,
    duplicatesSkipped: 0,
    tagsRejected: 0,
    manifestsUnavailable: 0,
    manifestsWithoutVersions: 0,
  };

  recordListing(branches: number, releases: number, tags: number): void {
    this.counters.branchesListed = branches;
    this.counters.releasesListed = releases;
    this.counters.tagsListed = tags;
  }

  recordProcessed(): void {
    this.counters.refsProcessed++;
  }

  recordEmitted(): void {
    this.counters.recordsEmitted++;
  }

  recordDuplicate(): void {
    this.counters.duplicatesSkipped++;
  }

  recordRejectedTag(): void {
    this.counters.tagsRejected++;
  }

  recordManifestOutcome(outcome: 'unavailable' | 'no_versions'): void {
    if (outcome === 'unavailable') {
      this.counters.manifestsUnavailable++;
    } else {
      this.counters.manifestsWithoutVersions++;
    }
  }

  snapshot(): RunStatsSnapshot {
    return {
      listed: {
        branches: this.counters.branchesListed,
        releases: this.counters.releasesListed,
        tags: this.counters.tagsListed,
      },
      refsProcessed: this.counters.refsProcessed,
      recordsEmitted: this.counters.recordsEmitted,
      duplicatesSkipped: this.counters.duplicatesSkipped,
      tagsRejected: this.counters.tagsRejected,
      manifestsUnavailable: this.counters.manifestsUnavailable,
      manifestsWithoutVersions: this.counters.manifestsWithoutVersions,
    };
  }
}
