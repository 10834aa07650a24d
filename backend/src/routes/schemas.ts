import { z } from 'zod';
import { MAX_QUESTION_LENGTH } from '../middleware/sanitize.js';

export const reportRequestSchema = z
  .object({
    question: z.string().trim().max(MAX_QUESTION_LENGTH).optional(),
    locale: z
      .string()
      .trim()
      .regex(/^[A-Za-z]{2,3}(-[A-Za-z0-9]{2,8})*$/, 'must be a BCP 47 language tag')
      .optional(),
    sessionId: z
      .string()
      .trim()
      .regex(/^[A-Za-z0-9._:-]{1,128}$/, 'may only contain letters, digits, ".", "_", ":" and "-"')
      .optional()
  })
  .strict();

export const dailyQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(30)
});

export const monthlyQuerySchema = z.object({
  months: z.coerce.number().int().min(1).max(60).default(12)
});

export function formatZodIssues(issues: z.ZodIssue[]): string[] {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
