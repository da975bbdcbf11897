import { NextRequest, NextResponse } from 'next/server';
import { requireAdminAuth } from '@/lib/auth/require-admin-auth';
import { getGoogleAdsServices } from '@/lib/bootstrap';
import { internalError } from '@/lib/api/route-errors';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

const ROUTE = '/api/google-ads/credential-status';

const NOTICE =
  'Google Ads conversion uploads are failing due to invalid or missing credentials. Please check the Google Ads settings.';

/** Backs the admin notice shown while uploads fail on credentials. */
export async function GET(req: NextRequest) {
  const denied = requireAdminAuth(req);
  if (denied) return denied;
  const requestId = req.headers.get('x-request-id') ?? undefined;

  try {
    const reason = await getGoogleAdsServices().flag.get();
    return NextResponse.json({
      credentialError: reason !== null,
      reason,
      message: reason !== null ? NOTICE : null,
    });
  } catch (err) {
    return internalError(err, ROUTE, requestId);
  }
}
