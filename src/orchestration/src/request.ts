/**
 * Request parsing and validation
 * Accepts the challenge request JSON and produces an immutable PipelineRequest.
 */

import { z } from 'zod';
import { PipelineRequest } from './types';
import { ValidationError } from './errors';

export const MAX_DOCUMENTS = 100;

const nonEmpty = (field: string) => z.string().trim().min(1, `${field} cannot be empty`);

export const requestSchema = z
  .object({
    challenge_info: z.record(z.unknown()).optional(),
    documents: z
      .array(
        z.object({
          filename: nonEmpty('Document filename'),
          title: z.string().trim().optional()
        })
      )
      .min(1, 'At least one document must be provided')
      .max(MAX_DOCUMENTS, `Too many documents (max ${MAX_DOCUMENTS} allowed)`),
    persona: z.object({ role: nonEmpty('Persona role') }),
    job_to_be_done: z.object({ task: nonEmpty('Task') })
  })
  .superRefine((request, ctx) => {
    const seen = new Set<string>();
    request.documents.forEach((document, index) => {
      if (seen.has(document.filename)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['documents', index, 'filename'],
          message: `Duplicate document filename "${document.filename}"`
        });
      }
      seen.add(document.filename);
    });
  });

export type RequestInput = z.input<typeof requestSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate a raw request. Throws ValidationError listing every problem found.
 */
export function parseRequest(input: unknown): PipelineRequest {
  const parsed = requestSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ValidationError(`Request validation failed: ${issues.join('; ')}`, issues);
  }

  const { challenge_info, documents, persona, job_to_be_done } = parsed.data;
  const request: PipelineRequest = {
    persona: persona.role,
    task: job_to_be_done.task,
    documents: Object.freeze(
      documents.map(document => Object.freeze({ id: document.filename, title: document.title || document.filename }))
    ),
    ...(challenge_info ? { challengeInfo: challenge_info } : {})
  };
  return Object.freeze(request);
}
