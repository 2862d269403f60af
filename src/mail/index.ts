// ============================================================================
// Mail Module: Barrel Export
// ============================================================================

export { MessageSchema, IngestRequestSchema } from './types.js';
export type { Message, IngestRequest } from './types.js';

export { resolveBodyText, buildCombinedText, previewText } from './body.js';
export type { TextPreview } from './body.js';
