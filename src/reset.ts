import { LookupError } from './errors.js';
import { parseReportFilename, requireReportFilename } from './report-filename.js';
import type { StatsStore } from './services/stats-store.js';

/**
 * Which previously aggregated data a forced run wipes before reprocessing.
 * With none of website, serverIds or file set, everything is deleted.
 */
export interface ResetScope {
  website?: string;
  /** Servers selected for this run; stats of these servers are deleted when `byServer` is set */
  serverIds: readonly number[];
  byServer?: boolean;
  file?: string;
}

export interface ResetCounts {
  scope: 'website' | 'server' | 'file' | 'all';
  statsDeleted: number;
  urlsDeleted: number;
  fingerprintsDeleted: number;
}

/**
 * Delete stats for the requested scopes, each followed by a sweep of URLs
 * left without stats and by removal of the fingerprints of the files whose
 * contribution was deleted, so later runs ingest them again. Runs in a single
 * transaction: a failing scope (unknown website, malformed filename) leaves
 * the database untouched.
 */
export async function resetScopes(store: StatsStore, scope: ResetScope): Promise<ResetCounts[]> {
  return store.transaction(async (tx) => {
    const counts: ResetCounts[] = [];

    if (scope.website) {
      const websiteId = await requireWebsite(tx, scope.website);
      const statsDeleted = await tx.deleteStatsForWebsite(websiteId);
      const urlsDeleted = await tx.sweepOrphanUrls(websiteId);
      const fingerprintsDeleted = await deleteWebsiteFingerprints(tx, scope.website);
      counts.push({ scope: 'website', statsDeleted, urlsDeleted, fingerprintsDeleted });
    }

    if (scope.byServer) {
      let statsDeleted = 0;
      let fingerprintsDeleted = 0;
      for (const serverId of scope.serverIds) {
        statsDeleted += await tx.deleteStatsForServer(serverId);
        fingerprintsDeleted += await tx.deleteFingerprintsForServer(serverId);
      }
      const urlsDeleted = await tx.sweepOrphanUrls();
      counts.push({ scope: 'server', statsDeleted, urlsDeleted, fingerprintsDeleted });
    }

    if (scope.file) {
      const info = requireReportFilename(scope.file);
      const websiteId = await requireWebsite(tx, info.website);
      const statsDeleted = await tx.deleteStatsForPeriod(websiteId, info.year, info.month, scope.serverIds);
      const urlsDeleted = await tx.sweepOrphanUrls(websiteId);
      let fingerprintsDeleted = 0;
      for (const serverId of scope.serverIds) {
        fingerprintsDeleted += await tx.deleteFingerprint(scope.file, serverId);
      }
      counts.push({ scope: 'file', statsDeleted, urlsDeleted, fingerprintsDeleted });
    }

    if (!scope.website && !scope.byServer && !scope.file) {
      const statsDeleted = await tx.deleteAllStats();
      const urlsDeleted = await tx.deleteAllUrls();
      const fingerprintsDeleted = await tx.deleteAllFingerprints();
      counts.push({ scope: 'all', statsDeleted, urlsDeleted, fingerprintsDeleted });
    }

    return counts;
  });
}

export async function requireWebsite(store: StatsStore, name: string): Promise<number> {
  const websiteId = await store.findWebsiteId(name);
  if (websiteId === undefined) {
    throw new LookupError(`Website '${name}' not found in the database.`);
  }
  return websiteId;
}

// Fingerprints only carry the filename; the website comes from parsing it
async function deleteWebsiteFingerprints(store: StatsStore, website: string): Promise<number> {
  let deleted = 0;
  for (const fingerprint of await store.listFingerprints()) {
    const parsed = parseReportFilename(fingerprint.filename);
    if (parsed.ok && parsed.value.website === website) {
      deleted += await store.deleteFingerprint(fingerprint.filename, fingerprint.serverId);
    }
  }
  return deleted;
}
