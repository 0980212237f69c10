import { z } from 'zod';
import { AssessmentError } from './errors';

function cleanEnvVar(val: string | undefined): string | undefined {
  if (!val) return undefined;
  let clean = val.trim();
  if (clean.startsWith('"') && clean.endsWith('"')) {
    clean = clean.substring(1, clean.length - 1);
  }
  return clean.replace(/\\n/g, '\n');
}

const configSchema = z
  .object({
    storage: z.enum(['memory', 'drive']).default('memory'),
    rootFolderId: z.string().min(1).optional(),
    catalogPath: z.string().min(1).optional(),
    completionThreshold: z.coerce.number().min(0).max(100).default(80),
    serviceAccountEmail: z.string().optional(),
    privateKey: z.string().optional(),
  })
  .refine(c => c.storage !== 'drive' || c.rootFolderId !== undefined, {
    message: 'APP_DATA_ROOT_FOLDER_ID is required when ASSESSMENT_STORAGE=drive',
    path: ['rootFolderId'],
  });

export type AppConfig = z.infer<typeof configSchema>;

/**
 * Reads application settings from environment variables
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = configSchema.safeParse({
    storage: cleanEnvVar(env.ASSESSMENT_STORAGE),
    rootFolderId: cleanEnvVar(env.APP_DATA_ROOT_FOLDER_ID),
    catalogPath: cleanEnvVar(env.CATALOG_PATH),
    completionThreshold: cleanEnvVar(env.COMPLETION_THRESHOLD),
    serviceAccountEmail: cleanEnvVar(env.GOOGLE_SERVICE_ACCOUNT_EMAIL),
    privateKey: cleanEnvVar(env.GOOGLE_PRIVATE_KEY),
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    console.error('Invalid configuration:', issues);
    throw new AssessmentError(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG_ERROR', 500);
  }
  return parsed.data;
}
