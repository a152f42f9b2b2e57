import { BaseCommandHandler, CommandContext, HandlerDeps } from './base-handler';
import { formatWalletList } from './wallet-actions';

export class ListHandler extends BaseCommandHandler {
  constructor(private readonly deps: HandlerDeps) {
    super('list', 'Show your wallets');
  }

  async handle(ctx: CommandContext): Promise<void> {
    if (!ctx.from) {
      await this.reply(ctx, '❌ Unable to identify user.');
      return;
    }

    const userId = ctx.from.id;
    const [wallets, active] = await Promise.all([
      this.deps.registry.listWallets(userId),
      this.deps.subscribers.isActive(userId),
    ]);

    if (wallets.length === 0) {
      await this.reply(ctx, 'You have no wallets yet. Use /wallet to add one.');
      return;
    }

    const status = active ? '' : '\n\n⏸ Alerts are paused. Send /sub to resume.';
    await this.reply(
      ctx,
      `Your wallets (${wallets.length}/${this.deps.registry.capacity}):\n${formatWalletList(wallets)}${status}`
    );
  }
}
