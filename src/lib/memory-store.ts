import { AssessmentCompletedError, AssessmentNotFoundError } from './errors';
import { mergeResponses } from './responses';
import type { AssessmentPage, AssessmentStore, ListAssessmentsQuery } from './store';
import type { Assessment, Response } from './types';

/**
 * In-process store for local development and tests.
 * Records are copied on the way in and out; each write checks and
 * updates in one synchronous step, so concurrent calls cannot interleave.
 */
export class MemoryAssessmentStore implements AssessmentStore {
  private readonly assessments = new Map<string, Assessment>();
  private readonly responses = new Map<string, Response[]>();

  async createAssessment(assessment: Assessment): Promise<Assessment> {
    if (this.assessments.has(assessment.assessment_id)) {
      throw new Error(`Assessment ${assessment.assessment_id} already exists`);
    }
    this.assessments.set(assessment.assessment_id, structuredClone(assessment));
    return structuredClone(assessment);
  }

  async getAssessment(assessmentId: string): Promise<Assessment | null> {
    const found = this.assessments.get(assessmentId);
    return found ? structuredClone(found) : null;
  }

  async listAssessments(query: ListAssessmentsQuery): Promise<AssessmentPage> {
    const all = Array.from(this.assessments.values())
      .filter(a => !query.status || a.status === query.status)
      .sort((a, b) => b.created_at.localeCompare(a.created_at));
    return {
      items: all.slice(query.offset, query.offset + query.limit).map(a => structuredClone(a)),
      total: all.length,
    };
  }

  async saveAssessment(assessment: Assessment): Promise<Assessment> {
    this.assessments.set(assessment.assessment_id, structuredClone(assessment));
    return structuredClone(assessment);
  }

  async markInProgress(assessmentId: string, updatedAt: string): Promise<Assessment> {
    const current = this.requireOpen(assessmentId);
    const updated: Assessment = {
      ...current,
      status: current.status === 'DRAFT' ? 'IN_PROGRESS' : current.status,
      updated_at: updatedAt,
    };
    this.assessments.set(assessmentId, updated);
    return structuredClone(updated);
  }

  async getResponses(assessmentId: string): Promise<Response[]> {
    return structuredClone(this.responses.get(assessmentId) ?? []);
  }

  async upsertResponses(assessmentId: string, incoming: Response[]): Promise<Response[]> {
    this.requireOpen(assessmentId);
    const merged = mergeResponses(this.responses.get(assessmentId) ?? [], structuredClone(incoming));
    this.responses.set(assessmentId, merged);
    return structuredClone(merged);
  }

  private requireOpen(assessmentId: string): Assessment {
    const current = this.assessments.get(assessmentId);
    if (!current) throw new AssessmentNotFoundError(assessmentId);
    if (current.status === 'COMPLETED') throw new AssessmentCompletedError(assessmentId);
    return current;
  }
}
