import { createSolarFlaresHandler } from '@/lib/api/weather';
import { getServices } from '@/lib/services';

export const dynamic = 'force-dynamic';

export const GET = createSolarFlaresHandler(getServices());
