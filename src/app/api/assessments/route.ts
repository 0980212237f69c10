import { NextRequest, NextResponse } from 'next/server';
import { createAssessment, listAssessments } from '@/lib/assessments';
import { errorResponse, getAppContext, readJsonBody } from '@/lib/http';

/**
 * GET /api/assessments?status=IN_PROGRESS&limit=50&offset=0
 */
export async function GET(req: NextRequest) {
  try {
    const { store } = await getAppContext();
    const query = Object.fromEntries(req.nextUrl.searchParams);
    return NextResponse.json(await listAssessments(store, query));
  } catch (error) {
    return errorResponse(error, 'Error listing assessments');
  }
}

export async function POST(req: NextRequest) {
  try {
    const { store } = await getAppContext();
    const body = await readJsonBody(req);
    const assessment = await createAssessment(store, body);
    return NextResponse.json({ assessment }, { status: 201 });
  } catch (error) {
    return errorResponse(error, 'Error creating assessment');
  }
}
