import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { z } from 'zod';
import { completeAssessment, createAssessment, getReport, submitResponses } from '@/lib/assessments';
import { DriveAssessmentStore } from '@/lib/drive-store';
import { AssessmentCompletedError, AssessmentNotFoundError } from '@/lib/errors';
import { upsertManifest } from '@/lib/manifest';
import type { Assessment, AssessmentStatus, ManifestEntry } from '@/lib/types';
import { answer, smallCatalog } from './fixtures';

// In-memory stand-in for the Drive folder tree
const fake = vi.hoisted(() => {
  interface FakeFile {
    id: string;
    name: string;
    parent: string;
    mimeType: string;
    content: string;
  }
  const FOLDER = 'application/vnd.google-apps.folder';
  const state = { files: new Map<string, FakeFile>(), nextId: 1, failSaves: 0 };

  const find = (name: string, parent: string, mimeType?: string): FakeFile | null =>
    Array.from(state.files.values()).find(
      f => f.name === name && f.parent === parent && (!mimeType || f.mimeType === mimeType),
    ) ?? null;

  const put = (name: string, parent: string, mimeType: string, content: string): FakeFile => {
    const file = { id: `file-${state.nextId++}`, name, parent, mimeType, content };
    state.files.set(file.id, file);
    return file;
  };

  return {
    state,
    reset() {
      state.files.clear();
      state.nextId = 1;
      state.failSaves = 0;
    },
    filesNamed(name: string): FakeFile[] {
      return Array.from(state.files.values()).filter(f => f.name === name);
    },
    drive: {
      async findFileByName(name: string, folderId: string, mimeType?: string) {
        const file = find(name, folderId, mimeType);
        return file ? { id: file.id, name: file.name } : null;
      },
      async ensureFolder(name: string, parentId: string): Promise<string> {
        return (find(name, parentId, FOLDER) ?? put(name, parentId, FOLDER, '')).id;
      },
      async readJsonFile<T>(fileId: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
        const file = state.files.get(fileId);
        if (!file) throw new Error(`File ${fileId} not found`);
        return schema.parse(JSON.parse(file.content));
      },
      async saveJsonFile(data: unknown, filename: string, folderId?: string, existingFileId?: string) {
        if (state.failSaves > 0) {
          state.failSaves--;
          throw new Error('Drive unavailable');
        }
        const content = JSON.stringify(data);
        if (existingFileId) {
          const file = state.files.get(existingFileId);
          if (!file) throw new Error(`File ${existingFileId} not found`);
          file.content = content;
          return { id: file.id, name: file.name };
        }
        if (!folderId) throw new Error('Folder ID is required for creating a new file');
        const file = put(filename, folderId, 'application/json', content);
        return { id: file.id, name: file.name };
      },
    },
  };
});

vi.mock('@/lib/drive', () => fake.drive);

const ROOT = 'root-folder';

function record(id: string, createdAt: string, status: AssessmentStatus = 'DRAFT'): Assessment {
  return {
    assessment_id: id,
    team_name: `Team ${id}`,
    status,
    created_at: createdAt,
    updated_at: createdAt,
    completion_date: null,
    overall_score: null,
    foundational_score: null,
    transformation_score: null,
    enterprise_score: null,
    governance_score: null,
    deviq_classification: null,
    results_json: null,
  };
}

function manifestEntries(): ManifestEntry[] {
  const [file] = fake.filesNamed('manifest.json');
  if (!file) return [];
  const data: { entries: ManifestEntry[] } = JSON.parse(file.content);
  return data.entries;
}

let store: DriveAssessmentStore;

beforeEach(() => {
  fake.reset();
  store = new DriveAssessmentStore(ROOT);
  vi.spyOn(console, 'info').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('DriveAssessmentStore', () => {
  it('writes the record and indexes it in the manifest', async () => {
    const a = record('a-1', '2026-01-01T00:00:00.000Z');
    await store.createAssessment(a);

    const [file] = fake.filesNamed('a-1.json');
    expect(manifestEntries()).toEqual([
      {
        assessment_id: 'a-1',
        assessment_file_id: file.id,
        status: 'DRAFT',
        team_name: 'Team a-1',
        created_at: '2026-01-01T00:00:00.000Z',
        updated_at: '2026-01-01T00:00:00.000Z',
      },
    ]);
    expect(await store.getAssessment('a-1')).toEqual(a);
  });

  it('returns null for an unknown id', async () => {
    expect(await store.getAssessment('missing')).toBeNull();
  });

  it('finds a record missing from the manifest through the assessments folder', async () => {
    const folderId = await fake.drive.ensureFolder('assessments', ROOT);
    const orphan = record('orphan', '2026-01-01T00:00:00.000Z');
    await fake.drive.saveJsonFile(orphan, 'orphan.json', folderId);

    expect(await store.getAssessment('orphan')).toEqual(orphan);
  });

  it('updates the same file on save', async () => {
    await store.createAssessment(record('a-1', '2026-01-01T00:00:00.000Z'));
    await store.saveAssessment({ ...record('a-1', '2026-01-01T00:00:00.000Z', 'IN_PROGRESS'), updated_at: '2026-01-02T00:00:00.000Z' });

    expect(fake.filesNamed('a-1.json')).toHaveLength(1);
    expect(manifestEntries()).toMatchObject([{ assessment_id: 'a-1', status: 'IN_PROGRESS', updated_at: '2026-01-02T00:00:00.000Z' }]);
    expect((await store.getAssessment('a-1'))?.status).toBe('IN_PROGRESS');
  });

  it('lists newest first and filters by status', async () => {
    await store.createAssessment(record('old', '2026-01-01T00:00:00.000Z'));
    await store.createAssessment(record('new', '2026-01-03T00:00:00.000Z', 'COMPLETED'));
    await store.createAssessment(record('mid', '2026-01-02T00:00:00.000Z'));

    const page = await store.listAssessments({ limit: 2, offset: 0 });
    expect(page.total).toBe(3);
    expect(page.items.map(a => a.assessment_id)).toEqual(['new', 'mid']);

    const drafts = await store.listAssessments({ status: 'DRAFT', limit: 10, offset: 0 });
    expect(drafts.items.map(a => a.assessment_id)).toEqual(['mid', 'old']);
  });

  it('merges answers into the stored response set', async () => {
    await store.createAssessment(record('a-1', '2026-01-01T00:00:00.000Z'));
    expect(await store.getResponses('a-1')).toEqual([]);

    await store.upsertResponses('a-1', [answer('A1-01', 3), answer('B1-01', 1)]);
    const merged = await store.upsertResponses('a-1', [answer('B1-01', 4, '2026-01-02T00:00:00.000Z')]);

    expect(fake.filesNamed('a-1.responses.json')).toHaveLength(1);
    expect(merged.map(r => [r.question_id, r.score])).toEqual([['A1-01', 3], ['B1-01', 4]]);
    expect(await store.getResponses('a-1')).toEqual(merged);
  });

  it('keeps answers written to the file by another writer', async () => {
    await store.createAssessment(record('a-1', '2026-01-01T00:00:00.000Z'));
    await store.upsertResponses('a-1', [answer('A1-01', 3)]);

    const [file] = fake.filesNamed('a-1.responses.json');
    file.content = JSON.stringify({
      responses: [answer('A1-01', 3), answer('A2-01', 2)],
      updated_at: '2026-01-01T00:00:00.000Z',
    });

    const merged = await store.upsertResponses('a-1', [answer('B1-01', 1)]);
    expect(merged.map(r => r.question_id)).toEqual(['A1-01', 'A2-01', 'B1-01']);
  });

  it('retries a failed response write', async () => {
    const retrying = new DriveAssessmentStore(ROOT, 0);
    await retrying.createAssessment(record('a-1', '2026-01-01T00:00:00.000Z'));
    fake.state.failSaves = 1;

    await retrying.upsertResponses('a-1', [answer('A1-01', 2)]);
    expect((await retrying.getResponses('a-1')).map(r => r.question_id)).toEqual(['A1-01']);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('refuses writes to a completed assessment', async () => {
    await store.createAssessment(record('done', '2026-01-01T00:00:00.000Z', 'COMPLETED'));
    await expect(store.upsertResponses('done', [answer('A1-01', 2)])).rejects.toBeInstanceOf(AssessmentCompletedError);
    await expect(store.markInProgress('done', '2026-01-02T00:00:00.000Z')).rejects.toBeInstanceOf(AssessmentCompletedError);
    expect(fake.filesNamed('done.responses.json')).toEqual([]);
    expect((await store.getAssessment('done'))?.status).toBe('COMPLETED');
  });

  it('moves a draft to in progress without touching other fields', async () => {
    const draft = record('a-1', '2026-01-01T00:00:00.000Z');
    await store.createAssessment(draft);
    const updated = await store.markInProgress('a-1', '2026-01-02T00:00:00.000Z');
    expect(updated).toEqual({ ...draft, status: 'IN_PROGRESS', updated_at: '2026-01-02T00:00:00.000Z' });
    expect(await store.getAssessment('a-1')).toEqual(updated);
  });

  it('reports a missing assessment on write', async () => {
    await expect(store.upsertResponses('missing', [answer('A1-01', 2)])).rejects.toBeInstanceOf(AssessmentNotFoundError);
  });

  it('runs the assessment lifecycle end to end', async () => {
    const catalog = smallCatalog();
    const { assessment_id } = await createAssessment(store, { team_name: 'Drive Team' });
    await submitResponses(store, catalog, assessment_id, {
      responses: [
        { question_id: 'A1-01', score: 4 },
        { question_id: 'A1-02', score: 4 },
        { question_id: 'A2-01', score: 4 },
        { question_id: 'B1-01', score: 4 },
      ],
    });
    await completeAssessment(store, catalog, assessment_id);

    const { report, frozen } = await getReport(store, catalog, assessment_id);
    expect(frozen).toBe(true);
    expect(report.overall_score).toBe(4);
    expect(report.classification?.label).toBe('AI-First');
    expect(manifestEntries()).toMatchObject([{ assessment_id, status: 'COMPLETED' }]);
  });
});

describe('upsertManifest', () => {
  const entry = (id: string): ManifestEntry => ({
    assessment_id: id,
    assessment_file_id: `file-for-${id}`,
    status: 'DRAFT',
    created_at: '2026-01-01T00:00:00.000Z',
    updated_at: '2026-01-01T00:00:00.000Z',
  });

  it('keeps entries written by others', async () => {
    await upsertManifest({ rootId: ROOT, entry: entry('a'), updatedAt: '2026-01-01T00:00:00.000Z' });
    await upsertManifest({ rootId: ROOT, entry: entry('b'), updatedAt: '2026-01-02T00:00:00.000Z' });
    expect(manifestEntries().map(e => e.assessment_id)).toEqual(['a', 'b']);
  });

  it('retries a failed write', async () => {
    fake.state.failSaves = 2;
    await upsertManifest({ rootId: ROOT, entry: entry('a'), updatedAt: '2026-01-01T00:00:00.000Z', retryDelayMs: 0 });
    expect(manifestEntries().map(e => e.assessment_id)).toEqual(['a']);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it('gives up after three attempts', async () => {
    fake.state.failSaves = 3;
    await expect(
      upsertManifest({ rootId: ROOT, entry: entry('a'), updatedAt: '2026-01-01T00:00:00.000Z', retryDelayMs: 0 }),
    ).rejects.toThrow('Failed to upsert manifest after 3 attempts: Error: Drive unavailable');
  });
});
