/**
 * API Layer Exports
 */

export { createApp } from './app.js';
export type { AppConfig } from './app.js';
export { createAuthMiddleware, tokensMatch } from './middleware/auth.js';
export {
  createRequestContextMiddleware,
  REQUEST_ID_HEADER,
} from './middleware/request-context.js';
export { createChatRoutes, MAX_PROMPT_LENGTH } from './routes/chat.js';
export { createHealthRoutes } from './routes/health.js';
export { errorResponse, getRequestId } from './utils/response.js';
export { ERROR_STATUS_MAP, getErrorStatus } from './types.js';
export type { ErrorResponse, ErrorStatus } from './types.js';
