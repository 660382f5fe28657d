import { NextResponse, type NextRequest } from 'next/server';
import { parseCorsOrigins } from '@/lib/config';

/**
 * CORS for the browser dashboard.
 * Allowed origins come from CORS_ORIGINS (defaults to the local dev ports).
 */

const ALLOWED_METHODS = 'GET, POST, OPTIONS';

export function corsHeaders(origin: string | null, allowedOrigins: string[]): Headers {
  const headers = new Headers();
  if (!origin || !allowedOrigins.includes(origin)) return headers;

  headers.set('Access-Control-Allow-Origin', origin);
  headers.set('Access-Control-Allow-Credentials', 'true');
  headers.set('Vary', 'Origin');
  return headers;
}

export function middleware(request: NextRequest) {
  const origin = request.headers.get('origin');
  const headers = corsHeaders(origin, parseCorsOrigins(process.env.CORS_ORIGINS));

  // Preflight
  if (request.method === 'OPTIONS') {
    if (headers.has('Access-Control-Allow-Origin')) {
      headers.set('Access-Control-Allow-Methods', ALLOWED_METHODS);
      headers.set(
        'Access-Control-Allow-Headers',
        request.headers.get('access-control-request-headers') || 'Content-Type'
      );
      headers.set('Access-Control-Max-Age', '600');
    }
    return new NextResponse(null, { status: 204, headers });
  }

  const response = NextResponse.next();
  headers.forEach((value, key) => response.headers.set(key, value));
  return response;
}

export const config = {
  matcher: ['/', '/health', '/api/:path*'],
};
