import { createSolarFlareHandler } from '@/lib/api/predictions';
import { getServices } from '@/lib/services';

export const dynamic = 'force-dynamic';

export const GET = createSolarFlareHandler(getServices());
