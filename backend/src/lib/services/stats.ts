import { TaskStatus, type ProfileStats } from '@mrm/shared';
import type { RecordStore } from '../store.js';

const RECENT_WINDOW_MS = 7 * 24 * 60 * 60 * 1000;

// Coverage and activity figures across every stored profile
export async function summarizeProfiles(
  store: RecordStore,
  now: Date = new Date()
): Promise<ProfileStats> {
  const [entities, pendingTasks, recentLogs] = await Promise.all([
    store.queryEntities(() => true),
    store.queryTasks((task) => task.status === TaskStatus.PENDING),
    store.queryLogs((entry) => now.getTime() - Date.parse(entry.timestamp) <= RECENT_WINDOW_MS),
  ]);

  let totalBanks = 0;
  let banksWithMrmData = 0;
  let personsNeedingReview = 0;
  const scored: number[] = [];

  for (const entity of entities) {
    if (entity.kind === 'person') {
      if (entity.needsReview) personsNeedingReview++;
      continue;
    }
    totalBanks++;
    if (entity.departments.length > 0) banksWithMrmData++;
    if (entity.completenessScore > 0) scored.push(entity.completenessScore);
  }

  const average =
    scored.length > 0 ? scored.reduce((sum, score) => sum + score, 0) / scored.length : 0;

  return {
    totalBanks,
    banksWithMrmData,
    mrmCoveragePercentage: totalBanks > 0 ? Math.round((banksWithMrmData / totalBanks) * 10000) / 100 : 0,
    averageCompletenessScore: Math.round(average * 100) / 100,
    pendingResearchTasks: pendingTasks.length,
    recentCollectionActivities: recentLogs.length,
    personsNeedingReview,
  };
}
