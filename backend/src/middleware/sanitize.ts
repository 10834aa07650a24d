import type { FastifyReply, FastifyRequest, HookHandlerDoneFunction } from 'fastify';

const HTML_TAG_REGEX = /<[^>]*>/g;
const SCRIPT_REGEX = /<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi;
export const MAX_QUESTION_LENGTH = 2000;
const TEXT_FIELDS = ['question', 'locale', 'sessionId'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function sanitizeText(value: string): string {
  let content = value.replace(SCRIPT_REGEX, '');
  content = content.replace(/<\/?(code|pre)>/gi, '`');
  content = content.replace(HTML_TAG_REGEX, '');
  content = content.replace(/\r\n?/g, '\n');
  content = content.replace(/ /g, ' ');
  content = content
    .split('\n')
    .map((line) => line.replace(/\s+$/g, ''))
    .join('\n');
  return content.replace(/\n{3,}/g, '\n\n').trim();
}

/** Strips markup from the report request's text fields before validation. */
export function sanitizeInput(request: FastifyRequest, reply: FastifyReply, done: HookHandlerDoneFunction) {
  const body = request.body;
  if (!isRecord(body)) {
    done();
    return;
  }

  for (const field of TEXT_FIELDS) {
    const value = body[field];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== 'string') {
      reply.code(400).send({ error: `${field} must be a string.` });
      done();
      return;
    }
    if (value.length > MAX_QUESTION_LENGTH) {
      reply.code(400).send({ error: `${field} too long. Maximum ${MAX_QUESTION_LENGTH} characters.` });
      done();
      return;
    }
    body[field] = sanitizeText(value);
  }

  done();
}
