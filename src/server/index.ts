// ============================================================================
// Server Module: Barrel Export
// ============================================================================

export { createApp } from './server.js';
export { healthHandler } from './health.js';
export { requestId, getRequestId, REQUEST_ID_HEADER } from './request-id.js';
