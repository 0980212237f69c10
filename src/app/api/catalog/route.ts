import { NextResponse } from 'next/server';
import { getCatalog, toCatalogTree } from '@/lib/catalog';
import { loadConfig } from '@/lib/config';
import { errorResponse } from '@/lib/http';

export async function GET() {
  try {
    const catalog = await getCatalog(loadConfig().catalogPath);
    return NextResponse.json(toCatalogTree(catalog));
  } catch (error) {
    return errorResponse(error, 'Error fetching catalog');
  }
}
