import { findFileByName, readJsonFile, saveJsonFile, ensureFolder } from './drive';
import { PATHS } from './paths';
import { manifestDataSchema } from './records';
import type { ManifestData, ManifestEntry } from './types';

const MAX_RETRIES = 3;
const RETRY_DELAY_MS = 1000;

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Loads the assessment index; empty when it does not exist yet
 */
export async function loadManifest(rootId: string): Promise<ManifestEntry[]> {
  const indexesFolder = await findFileByName(PATHS.INDEXES, rootId);
  if (!indexesFolder?.id) return [];

  const manifestFile = await findFileByName(PATHS.MANIFEST_FILE, indexesFolder.id, 'application/json');
  if (!manifestFile?.id) return [];

  const data = await readJsonFile(manifestFile.id, manifestDataSchema);
  return data.entries;
}

/**
 * Adds or replaces one index entry (keyed by assessment_id), with retries
 */
export async function upsertManifest(args: {
  rootId: string;
  entry: ManifestEntry;
  updatedAt: string;
  retryDelayMs?: number;
}): Promise<void> {
  const { rootId, entry, updatedAt, retryDelayMs = RETRY_DELAY_MS } = args;
  let attempt = 0;

  while (attempt < MAX_RETRIES) {
    try {
      const indexesFolder = await ensureFolder(PATHS.INDEXES, rootId);

      // Re-read on every attempt so a concurrent writer's entries are kept
      const manifestFile = await findFileByName(PATHS.MANIFEST_FILE, indexesFolder, 'application/json');
      let manifest: ManifestData = { entries: [], updated_at: updatedAt };
      if (manifestFile?.id) {
        manifest = await readJsonFile(manifestFile.id, manifestDataSchema);
      }

      const map = new Map<string, ManifestEntry>();
      for (const e of manifest.entries) {
        map.set(e.assessment_id, e);
      }
      map.set(entry.assessment_id, entry);

      const merged: ManifestData = {
        entries: Array.from(map.values()),
        updated_at: updatedAt,
      };

      await saveJsonFile(
        merged,
        PATHS.MANIFEST_FILE,
        indexesFolder,
        manifestFile?.id || undefined
      );
      return;
    } catch (error) {
      attempt++;
      console.warn(`Manifest upsert failed (attempt ${attempt}/${MAX_RETRIES}):`, error);
      if (attempt >= MAX_RETRIES) {
        throw new Error(`Failed to upsert manifest after ${MAX_RETRIES} attempts: ${error}`);
      }
      await sleep(retryDelayMs * attempt);
    }
  }
}
