export { ConversationModule } from "./conversation.module.js";
export { ConversationService, generateSessionToken, type ResolvedSession } from "./conversation.service.js";
