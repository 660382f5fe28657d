import { createChatHealthHandler } from '@/lib/api/chat';

export const dynamic = 'force-dynamic';

export const GET = createChatHealthHandler();
