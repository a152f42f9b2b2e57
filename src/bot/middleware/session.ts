import { Context } from 'telegraf';

/**
 * Per-chat conversation state. Commands that need a follow-up message
 * (an address to add, an index to remove) park the chat in
 * AWAITING_WALLET_INPUT until the input arrives or /cancel is sent.
 */
export enum ConversationState {
  IDLE = 'idle',
  AWAITING_WALLET_INPUT = 'awaiting_wallet_input',
}

export type WalletInputMode = 'add' | 'remove';

export interface BotSession {
  state: ConversationState;
  mode?: WalletInputMode;
  lastActivity: number;
}

export interface BotContext extends Context {
  session: BotSession;
}

export function createSession(): BotSession {
  return { state: ConversationState.IDLE, lastActivity: Date.now() };
}

export function awaitWalletInput(session: BotSession, mode: WalletInputMode): void {
  session.state = ConversationState.AWAITING_WALLET_INPUT;
  session.mode = mode;
  session.lastActivity = Date.now();
}

export function resetConversation(session: BotSession): void {
  session.state = ConversationState.IDLE;
  session.mode = undefined;
  session.lastActivity = Date.now();
}
