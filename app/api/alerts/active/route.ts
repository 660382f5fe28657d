import { createActiveAlertsHandler } from '@/lib/api/alerts';
import { getServices } from '@/lib/services';

export const dynamic = 'force-dynamic';

export const GET = createActiveAlertsHandler(getServices());
