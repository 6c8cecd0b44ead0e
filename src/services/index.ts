/**
 * Service Exports
 */

export { createChatService } from './chat.service.js';
export type { ChatService, ChatServiceInvoker } from './chat.service.js';
export { createSessionService, sameUser } from './session.service.js';
export type { SessionService } from './session.service.js';
export { createInMemorySessionStore } from './session.store.js';
export type { SessionStore } from './session.store.js';
export {
  createWorkspaceService,
  toDirectoryId,
} from './workspace.service.js';
export type { WorkspaceService } from './workspace.service.js';
