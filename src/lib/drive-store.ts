import { ensureFolder, findFileByName, readJsonFile, saveJsonFile } from './drive';
import { AssessmentCompletedError, AssessmentNotFoundError } from './errors';
import { loadManifest, upsertManifest } from './manifest';
import { assessmentFileName, PATHS, responsesFileName } from './paths';
import { assessmentSchema, responsesDataSchema } from './records';
import { mergeResponses } from './responses';
import type { AssessmentPage, AssessmentStore, ListAssessmentsQuery } from './store';
import type { Assessment, ManifestEntry, Response, ResponsesData } from './types';

const MAX_RETRIES = 3;
const RETRY_DELAY_MS = 1000;

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Google Drive layout under the root folder:
 *   assessments/{id}.json
 *   responses/{id}.responses.json
 *   indexes/manifest.json
 */
export class DriveAssessmentStore implements AssessmentStore {
  constructor(
    private readonly rootId: string,
    private readonly retryDelayMs: number = RETRY_DELAY_MS,
  ) {}

  private async findAssessmentFileId(assessmentId: string): Promise<string | null> {
    const entries = await loadManifest(this.rootId);
    const entry = entries.find(e => e.assessment_id === assessmentId);
    if (entry) return entry.assessment_file_id;

    // Fall back to the folder when the index is behind
    const folder = await findFileByName(PATHS.ASSESSMENTS, this.rootId);
    if (!folder?.id) return null;
    const file = await findFileByName(assessmentFileName(assessmentId), folder.id, 'application/json');
    return file?.id ?? null;
  }

  private async writeAssessment(assessment: Assessment, existingFileId?: string): Promise<Assessment> {
    const folderId = await ensureFolder(PATHS.ASSESSMENTS, this.rootId);
    const saved = await saveJsonFile(
      assessment,
      assessmentFileName(assessment.assessment_id),
      folderId,
      existingFileId,
    );
    if (!saved.id) {
      throw new Error(`Drive did not return a file id for assessment ${assessment.assessment_id}`);
    }

    const entry: ManifestEntry = {
      assessment_id: assessment.assessment_id,
      assessment_file_id: saved.id,
      status: assessment.status,
      team_name: assessment.team_name,
      created_at: assessment.created_at,
      updated_at: assessment.updated_at,
    };
    await upsertManifest({ rootId: this.rootId, entry, updatedAt: assessment.updated_at });
    return assessment;
  }

  async createAssessment(assessment: Assessment): Promise<Assessment> {
    return this.writeAssessment(assessment);
  }

  async getAssessment(assessmentId: string): Promise<Assessment | null> {
    const fileId = await this.findAssessmentFileId(assessmentId);
    if (!fileId) return null;
    return readJsonFile(fileId, assessmentSchema);
  }

  private async requireOpen(assessmentId: string): Promise<{ assessment: Assessment; fileId: string }> {
    const fileId = await this.findAssessmentFileId(assessmentId);
    if (!fileId) throw new AssessmentNotFoundError(assessmentId);
    const assessment = await readJsonFile(fileId, assessmentSchema);
    if (assessment.status === 'COMPLETED') throw new AssessmentCompletedError(assessmentId);
    return { assessment, fileId };
  }

  async listAssessments(query: ListAssessmentsQuery): Promise<AssessmentPage> {
    const entries = (await loadManifest(this.rootId))
      .filter(e => !query.status || e.status === query.status)
      .sort((a, b) => b.created_at.localeCompare(a.created_at));

    const page = entries.slice(query.offset, query.offset + query.limit);
    const items = await Promise.all(page.map(e => readJsonFile(e.assessment_file_id, assessmentSchema)));
    return { items, total: entries.length };
  }

  async saveAssessment(assessment: Assessment): Promise<Assessment> {
    const fileId = await this.findAssessmentFileId(assessment.assessment_id);
    return this.writeAssessment(assessment, fileId ?? undefined);
  }

  async markInProgress(assessmentId: string, updatedAt: string): Promise<Assessment> {
    const { assessment, fileId } = await this.requireOpen(assessmentId);
    const updated: Assessment = {
      ...assessment,
      status: assessment.status === 'DRAFT' ? 'IN_PROGRESS' : assessment.status,
      updated_at: updatedAt,
    };
    return this.writeAssessment(updated, fileId);
  }

  async getResponses(assessmentId: string): Promise<Response[]> {
    const folder = await findFileByName(PATHS.RESPONSES, this.rootId);
    if (!folder?.id) return [];
    const file = await findFileByName(responsesFileName(assessmentId), folder.id, 'application/json');
    if (!file?.id) return [];
    const data = await readJsonFile(file.id, responsesDataSchema);
    return data.responses;
  }

  async upsertResponses(assessmentId: string, incoming: Response[]): Promise<Response[]> {
    for (let attempt = 1; ; attempt++) {
      await this.requireOpen(assessmentId);
      try {
        const folderId = await ensureFolder(PATHS.RESPONSES, this.rootId);
        const fileName = responsesFileName(assessmentId);

        // Re-read right before the write so answers saved in the meantime are kept
        const existing = await findFileByName(fileName, folderId, 'application/json');
        const current = existing?.id ? (await readJsonFile(existing.id, responsesDataSchema)).responses : [];
        const merged = mergeResponses(current, incoming);

        const data: ResponsesData = { responses: merged, updated_at: new Date().toISOString() };
        await saveJsonFile(data, fileName, folderId, existing?.id ?? undefined);
        return merged;
      } catch (error) {
        console.warn(`Response upsert for ${assessmentId} failed (attempt ${attempt}/${MAX_RETRIES}):`, error);
        if (attempt >= MAX_RETRIES) {
          throw new Error(`Failed to upsert responses after ${MAX_RETRIES} attempts: ${error}`);
        }
        await sleep(this.retryDelayMs * attempt);
      }
    }
  }
}
