import path from 'node:path';
import { NextRequest, NextResponse } from 'next/server';
import { requireAdminAuth } from '@/lib/auth/require-admin-auth';
import { getGoogleAdsServices } from '@/lib/bootstrap';
import { internalError, jsonError } from '@/lib/api/route-errors';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

const ROUTE = '/api/google-ads/log';

/** Download the diagnostic log as a plain-text attachment. */
export async function GET(req: NextRequest) {
  const denied = requireAdminAuth(req);
  if (denied) return denied;
  const requestId = req.headers.get('x-request-id') ?? undefined;

  try {
    const { logger } = getGoogleAdsServices();
    if (!logger.exists()) {
      return jsonError(404, 'Log file does not exist.', 'LOG_NOT_FOUND');
    }
    const contents = await logger.getContents();
    return new NextResponse(contents, {
      status: 200,
      headers: {
        'Content-Type': 'text/plain; charset=utf-8',
        'Content-Disposition': `attachment; filename="${path.basename(logger.getPath())}"`,
        'Content-Length': String(Buffer.byteLength(contents, 'utf8')),
        'Cache-Control': 'no-store',
      },
    });
  } catch (err) {
    return internalError(err, ROUTE, requestId);
  }
}

export async function DELETE(req: NextRequest) {
  const denied = requireAdminAuth(req);
  if (denied) return denied;
  const requestId = req.headers.get('x-request-id') ?? undefined;

  try {
    await getGoogleAdsServices().logger.clear();
    return NextResponse.json({ success: true });
  } catch (err) {
    return internalError(err, ROUTE, requestId);
  }
}
