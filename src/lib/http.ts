import { NextRequest, NextResponse } from 'next/server';
import { getCatalog, type CatalogReader } from './catalog';
import { loadConfig, type AppConfig } from './config';
import { AssessmentError, ValidationError } from './errors';
import { getAssessmentStore, type AssessmentStore } from './store';

export interface AppContext {
  config: AppConfig;
  catalog: CatalogReader;
  store: AssessmentStore;
}

export type IdRouteContext = { params: Promise<{ id: string }> };

export async function getAppContext(): Promise<AppContext> {
  const config = loadConfig();
  const [catalog, store] = await Promise.all([
    getCatalog(config.catalogPath),
    getAssessmentStore(config),
  ]);
  return { config, catalog, store };
}

/**
 * Request JSON; an empty body reads as {} when allowEmpty is set
 */
export async function readJsonBody(req: NextRequest, allowEmpty = false): Promise<unknown> {
  const text = await req.text();
  if (text.trim() === '') {
    if (allowEmpty) return {};
    throw new ValidationError('Request body is required');
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
}

/**
 * Maps an error to a JSON response: { error, details? }
 */
export function errorResponse(error: unknown, context: string): NextResponse {
  if (error instanceof AssessmentError) {
    if (error.status >= 500) {
      console.error(`${context}:`, error);
    } else {
      console.warn(`${context}: ${error.message}`);
    }
    const body = error instanceof ValidationError && error.issues.length > 0
      ? { error: error.message, details: error.issues }
      : { error: error.message };
    return NextResponse.json(body, { status: error.status });
  }
  console.error(`${context}:`, error);
  return NextResponse.json({ error: 'Internal server error' }, { status: 500 });
}
