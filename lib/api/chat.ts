import { NextResponse, type NextRequest } from 'next/server';
import { generateChatResponse } from '../chat';
import { ValidationError, errorMessage, type ValidationIssue } from '../errors';
import { isRecord } from '../fields';
import { serverErrorResponse, success, validationErrorResponse } from '../http';
import type { Services } from '../services';
import type { ChatMessage } from '../types';

const TAG = 'Chat API';

export interface ChatRequest {
  message: string;
  history: ChatMessage[];
}

function parseHistory(value: unknown, issues: ValidationIssue[]): ChatMessage[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    issues.push({ loc: ['body', 'history'], msg: 'Input should be a valid list' });
    return [];
  }

  const history: ChatMessage[] = [];
  value.forEach((entry: unknown, index) => {
    const loc = ['body', 'history', String(index)];
    if (!isRecord(entry)) {
      issues.push({ loc, msg: 'Input should be a valid dictionary' });
      return;
    }
    const { role, content } = entry;
    if (typeof role !== 'string') issues.push({ loc: [...loc, 'role'], msg: 'Field required' });
    if (typeof content !== 'string') issues.push({ loc: [...loc, 'content'], msg: 'Field required' });
    if (typeof role === 'string' && typeof content === 'string') history.push({ role, content });
  });
  return history;
}

export function parseChatRequest(body: unknown): ChatRequest {
  if (!isRecord(body)) {
    throw new ValidationError([{ loc: ['body'], msg: 'Input should be a valid dictionary' }]);
  }

  const issues: ValidationIssue[] = [];
  const { message } = body;
  if (typeof message !== 'string') {
    issues.push({ loc: ['body', 'message'], msg: 'Field required' });
  }
  const history = parseHistory(body.history, issues);

  if (issues.length > 0 || typeof message !== 'string') throw new ValidationError(issues);
  return { message, history };
}

/** POST /api/chat/message */
export function createChatMessageHandler({ donki, swpc }: Services) {
  return async (request: NextRequest): Promise<NextResponse> => {
    let chatRequest: ChatRequest;
    try {
      const body: unknown = await request.json();
      chatRequest = parseChatRequest(body);
    } catch (err) {
      if (err instanceof ValidationError) return validationErrorResponse(err);
      return validationErrorResponse(
        new ValidationError([{ loc: ['body'], msg: `JSON decode error: ${errorMessage(err)}` }])
      );
    }

    try {
      const reply = await generateChatResponse({ donki, swpc }, chatRequest.message, chatRequest.history);
      return success(reply);
    } catch (err) {
      return serverErrorResponse(TAG, err, `Error generating response: ${errorMessage(err)}`);
    }
  };
}

export function createChatHealthHandler() {
  return async (): Promise<NextResponse> =>
    NextResponse.json({ status: 'operational', message: 'Space Weather Assistant is ready' });
}
