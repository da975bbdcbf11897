import { NextRequest, NextResponse } from 'next/server';
import { requireAdminAuth } from '@/lib/auth/require-admin-auth';
import { getGoogleAdsServices } from '@/lib/bootstrap';
import { internalError, jsonError, readJson } from '@/lib/api/route-errors';
import { isConfiguredSettings } from '@/lib/settings/repository';
import { SettingsUpdateSchema } from '@/lib/settings/types';
import { maskSettings } from '@/lib/services/settings-service';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

const ROUTE = '/api/google-ads/settings';

export async function GET(req: NextRequest) {
  const denied = requireAdminAuth(req);
  if (denied) return denied;
  const requestId = req.headers.get('x-request-id') ?? undefined;

  try {
    const settings = await getGoogleAdsServices().settings.getAll();
    return NextResponse.json({ settings: maskSettings(settings), configured: isConfiguredSettings(settings) });
  } catch (err) {
    return internalError(err, ROUTE, requestId);
  }
}

export async function PUT(req: NextRequest) {
  const denied = requireAdminAuth(req);
  if (denied) return denied;
  const requestId = req.headers.get('x-request-id') ?? undefined;

  const parsed = SettingsUpdateSchema.safeParse(await readJson(req));
  if (!parsed.success) {
    return jsonError(400, 'Invalid settings', 'INVALID_BODY', { details: parsed.error.flatten().fieldErrors });
  }

  try {
    const { settings, jobsReset } = await getGoogleAdsServices().settingsService.saveSettings(parsed.data);
    return NextResponse.json({
      settings: maskSettings(settings),
      configured: isConfiguredSettings(settings),
      jobsReset,
    });
  } catch (err) {
    return internalError(err, ROUTE, requestId);
  }
}
