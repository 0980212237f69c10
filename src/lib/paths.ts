export const PATHS = {
  ASSESSMENTS: 'assessments',
  RESPONSES: 'responses',
  INDEXES: 'indexes',
  MANIFEST_FILE: 'manifest.json',
  CATALOG_FILE: 'data/catalog.json',
} as const;

export const assessmentFileName = (assessmentId: string) => `${assessmentId}.json`;
export const responsesFileName = (assessmentId: string) => `${assessmentId}.responses.json`;
