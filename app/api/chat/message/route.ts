import { createChatMessageHandler } from '@/lib/api/chat';
import { getServices } from '@/lib/services';

export const dynamic = 'force-dynamic';

export const POST = createChatMessageHandler(getServices());
