import { BaseCommandHandler, CommandContext, HandlerDeps } from './base-handler';
import { logger } from '../../utils/logger';

export function getWelcomeMessage(firstName: string, deps: HandlerDeps): string {
  return `👋 Welcome to PerpWatch, ${firstName}!

I watch Hyperliquid perp positions and alert you when a position changes by more than ${deps.thresholdPct}%.

Commands:
/sub - Subscribe to alerts
/unsub - Pause alerts (your wallets are kept)
/wallet - Add a wallet to monitor (max ${deps.registry.capacity})
/remove - Remove a wallet
/list - Show your wallets
/cancel - Cancel wallet input
/help - Show this message`;
}

export class StartHandler extends BaseCommandHandler {
  constructor(private readonly deps: HandlerDeps, commandName = 'start') {
    super(commandName, commandName === 'help' ? 'Show available commands' : 'Show the welcome message');
  }

  async handle(ctx: CommandContext): Promise<void> {
    if (ctx.from) {
      logger.info(`User ${ctx.from.id} opened /${this.commandName}`);
    }
    await this.reply(ctx, getWelcomeMessage(ctx.from?.first_name ?? 'there', this.deps));
  }
}
