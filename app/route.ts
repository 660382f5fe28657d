import { NextResponse } from 'next/server';

export const dynamic = 'force-dynamic';

/**
 * GET /
 * Liveness and a pointer to the API surface.
 */
export async function GET() {
  return NextResponse.json({
    message: 'Heliowatch API - Space Weather Monitoring',
    status: 'operational',
    endpoints: ['/api/weather', '/api/alerts', '/api/predictions', '/api/chat'],
  });
}
