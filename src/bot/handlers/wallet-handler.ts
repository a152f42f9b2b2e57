import { BaseCommandHandler, CommandContext, HandlerDeps } from './base-handler';
import { awaitWalletInput } from '../middleware/session';
import {
  NOT_SUBSCRIBED_MESSAGE,
  formatWalletList,
  submitWalletAddress,
  submitWalletIndex,
} from './wallet-actions';

export const ADD_WALLET_PROMPT = 'Send me an EVM wallet address to add (0x...), or /cancel:';
export const REMOVE_WALLET_PROMPT = 'Send the number of the wallet to remove, or /cancel:';

/**
 * /wallet [address]. Without an argument the chat waits for the address.
 */
export class WalletHandler extends BaseCommandHandler {
  constructor(private readonly deps: HandlerDeps) {
    super('wallet', 'Add a wallet to monitor');
  }

  async handle(ctx: CommandContext, args: string[]): Promise<void> {
    if (!ctx.from) {
      await this.reply(ctx, '❌ Unable to identify user.');
      return;
    }

    const userId = ctx.from.id;
    if (!(await this.deps.subscribers.isActive(userId))) {
      await this.reply(ctx, NOT_SUBSCRIBED_MESSAGE);
      return;
    }

    const address = args[0];
    if (address) {
      const keepWaiting = await submitWalletAddress(ctx, this.deps, userId, address);
      if (keepWaiting) {
        awaitWalletInput(ctx.session, 'add');
      }
      return;
    }

    const wallets = await this.deps.registry.listWallets(userId);
    const max = this.deps.registry.capacity;
    const header = wallets.length > 0
      ? `Your current wallets (${wallets.length}/${max}):\n${formatWalletList(wallets)}`
      : 'You have no wallets yet.';

    awaitWalletInput(ctx.session, 'add');
    await this.reply(ctx, `${header}\n\n${ADD_WALLET_PROMPT}`);
  }
}

/**
 * /remove [index]. Indexes follow the /list order, oldest first.
 */
export class RemoveWalletHandler extends BaseCommandHandler {
  constructor(private readonly deps: HandlerDeps) {
    super('remove', 'Remove a wallet');
  }

  async handle(ctx: CommandContext, args: string[]): Promise<void> {
    if (!ctx.from) {
      await this.reply(ctx, '❌ Unable to identify user.');
      return;
    }

    const userId = ctx.from.id;
    const index = args[0];
    if (index) {
      const keepWaiting = await submitWalletIndex(ctx, this.deps, userId, index);
      if (keepWaiting) {
        awaitWalletInput(ctx.session, 'remove');
      }
      return;
    }

    const wallets = await this.deps.registry.listWallets(userId);
    if (wallets.length === 0) {
      await this.reply(ctx, 'You have no wallets to remove.');
      return;
    }

    awaitWalletInput(ctx.session, 'remove');
    await this.reply(ctx, `${formatWalletList(wallets)}\n\n${REMOVE_WALLET_PROMPT}`);
  }
}
