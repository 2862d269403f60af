/**
 * Mail Type Definitions
 *
 * A Message is one already-fetched email, with attachment text flattened
 * upstream. Validated at the HTTP boundary; the enrichment pipeline treats
 * every field except `id` as optional.
 */

import { z } from 'zod';

export const MessageSchema = z.object({
  /** External message id (idempotency key) */
  id: z.string().trim().min(1),
  subject: z.string().nullish(),
  /** ISO-8601 receipt timestamp */
  receivedAt: z.string().nullish(),
  /** Full plain-text body (preferred) */
  bodyText: z.string().nullish(),
  /** Body with markup stripped (second choice) */
  bodyPlain: z.string().nullish(),
  /** Short preview (last resort) */
  bodyPreview: z.string().nullish(),
  attachmentText: z.string().nullish(),
  attachmentNames: z.array(z.string()).optional(),
  /** How each attachment's text was obtained (e.g. "pdf-text", "ocr") */
  attachmentMethods: z.array(z.string()).optional(),
  sender: z.string().nullish(),
  receivedFrom: z.string().nullish(),
});

export type Message = z.infer<typeof MessageSchema>;

export const IngestRequestSchema = z.object({
  messages: z.array(MessageSchema),
});

export type IngestRequest = z.infer<typeof IngestRequestSchema>;
