export { BotService, type BotConfig } from './bot-service';

export {
  ConversationState,
  createSession,
  awaitWalletInput,
  resetConversation,
  type BotContext,
  type BotSession,
  type WalletInputMode,
} from './middleware/session';

export * from './handlers';
