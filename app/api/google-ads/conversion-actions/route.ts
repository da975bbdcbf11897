import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { requireAdminAuth } from '@/lib/auth/require-admin-auth';
import { getGoogleAdsServices } from '@/lib/bootstrap';
import { internalError, jsonError, readJson } from '@/lib/api/route-errors';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

const ROUTE = '/api/google-ads/conversion-actions';

const CreateBodySchema = z.object({
  name: z.string().trim().min(1).max(100),
  category: z
    .string()
    .trim()
    .regex(/^[A-Z_]+$/, 'category must be a ConversionActionCategory value')
    .optional(),
});

const ConversionActionIdSchema = z.string().regex(/^\d+$/, 'id must be numeric');

/** Create a conversion action and store it in settings. */
export async function POST(req: NextRequest) {
  const denied = requireAdminAuth(req);
  if (denied) return denied;
  const requestId = req.headers.get('x-request-id') ?? undefined;

  const parsed = CreateBodySchema.safeParse(await readJson(req));
  if (!parsed.success) {
    return jsonError(400, 'Invalid request body', 'INVALID_BODY', { details: parsed.error.flatten().fieldErrors });
  }

  try {
    const result = await getGoogleAdsServices().adminService.createConversionAction(parsed.data);
    if (!result.ok) {
      const status = result.code === 'NOT_CONFIGURED' ? 400 : 502;
      return jsonError(status, result.message, result.code, { credentialError: result.credentialError });
    }
    return NextResponse.json(
      { success: true, message: result.message, conversionActionId: result.conversionActionId },
      { status: 201 }
    );
  } catch (err) {
    return internalError(err, ROUTE, requestId);
  }
}

/** Name and category of an existing conversion action (?id=). */
export async function GET(req: NextRequest) {
  const denied = requireAdminAuth(req);
  if (denied) return denied;
  const requestId = req.headers.get('x-request-id') ?? undefined;

  const id = ConversionActionIdSchema.safeParse(req.nextUrl.searchParams.get('id') ?? '');
  if (!id.success) {
    return jsonError(400, 'Query parameter id must be a numeric conversion action ID', 'INVALID_QUERY');
  }

  try {
    const result = await getGoogleAdsServices().adminService.fetchConversionActionDetails(id.data);
    if (!result.ok) {
      const status = result.code === 'NOT_CONFIGURED' ? 400 : 502;
      return jsonError(status, result.message, result.code);
    }
    return NextResponse.json({ id: id.data, name: result.name, category: result.category });
  } catch (err) {
    return internalError(err, ROUTE, requestId);
  }
}
