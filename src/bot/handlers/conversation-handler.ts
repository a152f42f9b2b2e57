import { BaseCommandHandler, CommandContext, HandlerDeps } from './base-handler';
import { ConversationState, resetConversation } from '../middleware/session';
import { submitWalletAddress, submitWalletIndex } from './wallet-actions';

export class CancelHandler extends BaseCommandHandler {
  constructor() {
    super('cancel', 'Cancel wallet input');
  }

  async handle(ctx: CommandContext): Promise<void> {
    if (ctx.session.state === ConversationState.IDLE) {
      await this.reply(ctx, 'Nothing to cancel.');
      return;
    }

    const mode = ctx.session.mode;
    resetConversation(ctx.session);
    await this.reply(ctx, mode === 'remove' ? 'Wallet removal cancelled.' : 'Wallet addition cancelled.');
  }
}

/**
 * Plain text messages. Only meaningful while a /wallet or /remove
 * prompt is waiting for its input.
 */
export class ConversationHandler {
  constructor(private readonly deps: HandlerDeps) {}

  async handleText(ctx: CommandContext, text: string): Promise<void> {
    if (!ctx.from) {
      return;
    }

    if (text.startsWith('/')) {
      await ctx.reply('Unknown command. Use /help to see available commands.');
      return;
    }

    if (ctx.session.state !== ConversationState.AWAITING_WALLET_INPUT) {
      await ctx.reply('Use /wallet to add a wallet or /help to see all commands.');
      return;
    }

    const keepWaiting = ctx.session.mode === 'remove'
      ? await submitWalletIndex(ctx, this.deps, ctx.from.id, text)
      : await submitWalletAddress(ctx, this.deps, ctx.from.id, text.trim());

    if (!keepWaiting) {
      resetConversation(ctx.session);
    }
  }
}
