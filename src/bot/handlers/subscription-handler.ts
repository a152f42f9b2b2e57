import { BaseCommandHandler, CommandContext, HandlerDeps } from './base-handler';
import { SubscribeOutcome } from '../../types/monitoring';
import { formatShortAddress } from '../../utils/address';
import { logger } from '../../utils/logger';

export class SubscribeHandler extends BaseCommandHandler {
  constructor(private readonly deps: HandlerDeps) {
    super('sub', 'Subscribe to alerts');
  }

  async handle(ctx: CommandContext): Promise<void> {
    if (!ctx.from) {
      await this.reply(ctx, '❌ Unable to identify user.');
      return;
    }

    const userId = ctx.from.id;
    const displayName = ctx.from.username ?? ctx.from.first_name;
    const outcome = await this.deps.subscribers.subscribe(userId, displayName);

    switch (outcome) {
      case SubscribeOutcome.NEWLY_SUBSCRIBED:
        await this.reply(ctx, await this.welcomeNewSubscriber(userId));
        return;
      case SubscribeOutcome.REACTIVATED: {
        const wallets = await this.deps.registry.listWallets(userId);
        await this.reply(
          ctx,
          `✓ Welcome back! Monitoring resumed for ${wallets.length} wallet(s).\n\nUse /list to see them.`
        );
        return;
      }
      case SubscribeOutcome.ALREADY_ACTIVE: {
        const wallets = await this.deps.registry.listWallets(userId);
        await this.reply(
          ctx,
          `You're already subscribed with ${wallets.length} wallet(s)!\n\nUse /wallet to add more.`
        );
        return;
      }
    }
  }

  private async welcomeNewSubscriber(userId: number): Promise<string> {
    const defaultAddress = this.deps.defaultWalletAddress;
    const wallets = await this.deps.registry.listWallets(userId);

    if (defaultAddress && wallets.length === 0) {
      const result = await this.deps.registry.addWallet(userId, defaultAddress);
      if (result.added) {
        return `✓ Subscribed!\n\nDefault wallet added: ${formatShortAddress(result.address)}\n\nUse /wallet to add your own wallets.`;
      }
      logger.warn('Default wallet could not be added', { userId, reason: result.reason });
    }

    return '✓ Subscribed!\n\nUse /wallet to add a wallet to monitor.';
  }
}

export class UnsubscribeHandler extends BaseCommandHandler {
  constructor(private readonly deps: HandlerDeps) {
    super('unsub', 'Pause alerts');
  }

  async handle(ctx: CommandContext): Promise<void> {
    if (!ctx.from) {
      await this.reply(ctx, '❌ Unable to identify user.');
      return;
    }

    const changed = await this.deps.subscribers.unsubscribe(ctx.from.id);
    await this.reply(
      ctx,
      changed
        ? 'Unsubscribed. Your wallets are kept; send /sub to resume alerts.'
        : 'You are not subscribed.'
    );
  }
}
