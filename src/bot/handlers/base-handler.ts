import { Telegraf } from 'telegraf';
import { SubscriberStore } from '../../services/monitor/subscriber-store';
import { WalletRegistry } from '../../services/monitor/wallet-registry';
import { getErrorMessage, handleError as reportError } from '../../utils/error-handler';
import { logger } from '../../utils/logger';
import { BotContext, BotSession } from '../middleware/session';

/**
 * The part of a Telegraf context the handlers use.
 */
export interface CommandContext {
  from?: { id: number; first_name: string; username?: string };
  session: BotSession;
  reply(text: string): Promise<unknown>;
}

export interface HandlerDeps {
  subscribers: SubscriberStore;
  registry: WalletRegistry;
  /** Added on first subscribe when set. */
  defaultWalletAddress: string;
  /** Shown in the welcome text. */
  thresholdPct: number;
}

export const GENERIC_ERROR_MESSAGE = '❌ Something went wrong. Please try again later.';

export abstract class BaseCommandHandler {
  constructor(
    readonly commandName: string,
    readonly description: string
  ) {}

  abstract handle(ctx: CommandContext, args: string[]): Promise<void>;

  parseCommand(text?: string): { command: string; args: string[] } {
    if (!text) {
      return { command: '', args: [] };
    }

    const parts = text.trim().split(/\s+/);
    const command = parts[0]?.toLowerCase().replace('/', '').split('@')[0] || '';
    const args = parts.slice(1);

    return { command, args };
  }

  protected async reply(ctx: CommandContext, message: string): Promise<void> {
    try {
      await ctx.reply(message);
    } catch (error) {
      logger.error(`Error sending reply in ${this.commandName}:`, { error: getErrorMessage(error) });
    }
  }

  protected async handleError(ctx: CommandContext, error: unknown): Promise<void> {
    reportError(error, { command: this.commandName, userId: ctx.from?.id });
    await this.reply(ctx, GENERIC_ERROR_MESSAGE);
  }

  register(bot: Telegraf<BotContext>): void {
    bot.command(this.commandName, async ctx => {
      const { args } = this.parseCommand(ctx.message.text);
      try {
        await this.handle(ctx, args);
      } catch (error) {
        await this.handleError(ctx, error);
      }
    });

    logger.debug(`Registered command handler: /${this.commandName}`);
  }
}
