export {
  BaseCommandHandler,
  GENERIC_ERROR_MESSAGE,
  type CommandContext,
  type HandlerDeps,
} from './base-handler';
export { StartHandler, getWelcomeMessage } from './start-handler';
export { SubscribeHandler, UnsubscribeHandler } from './subscription-handler';
export { WalletHandler, RemoveWalletHandler, ADD_WALLET_PROMPT, REMOVE_WALLET_PROMPT } from './wallet-handler';
export { ListHandler } from './list-handler';
export { CancelHandler, ConversationHandler } from './conversation-handler';
export { HandlerRegistry, type BotCommandInfo } from './handler-registry';
