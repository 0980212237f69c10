import { loadConfig, type AppConfig } from './config';
import type { Assessment, AssessmentStatus, Response } from './types';

export interface ListAssessmentsQuery {
  status?: AssessmentStatus;
  limit: number;
  offset: number;
}

export interface AssessmentPage {
  items: Assessment[];
  total: number;
}

/**
 * Persistence for assessment records and their response sets
 */
export interface AssessmentStore {
  createAssessment(assessment: Assessment): Promise<Assessment>;
  getAssessment(assessmentId: string): Promise<Assessment | null>;
  /** Newest first */
  listAssessments(query: ListAssessmentsQuery): Promise<AssessmentPage>;
  saveAssessment(assessment: Assessment): Promise<Assessment>;
  /**
   * Applies only the status / updated_at change of a response save:
   * DRAFT becomes IN_PROGRESS. Throws AssessmentCompletedError on a completed record.
   */
  markInProgress(assessmentId: string, updatedAt: string): Promise<Assessment>;
  getResponses(assessmentId: string): Promise<Response[]>;
  /**
   * Upserts by question_id against the latest stored set and returns the merged set.
   * Throws AssessmentCompletedError on a completed record.
   */
  upsertResponses(assessmentId: string, incoming: Response[]): Promise<Response[]>;
}

let cachedStore: AssessmentStore | null = null;

/**
 * Store selected by ASSESSMENT_STORAGE; one instance per process
 */
export async function getAssessmentStore(config: AppConfig = loadConfig()): Promise<AssessmentStore> {
  if (cachedStore) return cachedStore;

  if (config.storage === 'drive' && config.rootFolderId) {
    const { DriveAssessmentStore } = await import('./drive-store');
    cachedStore = new DriveAssessmentStore(config.rootFolderId);
  } else {
    const { MemoryAssessmentStore } = await import('./memory-store');
    cachedStore = new MemoryAssessmentStore();
  }
  console.info(`Assessment storage: ${config.storage}`);
  return cachedStore;
}

export function resetAssessmentStore(): void {
  cachedStore = null;
}
