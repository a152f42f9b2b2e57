import { Telegraf } from 'telegraf';
import { BaseCommandHandler, HandlerDeps } from './base-handler';
import { StartHandler } from './start-handler';
import { SubscribeHandler, UnsubscribeHandler } from './subscription-handler';
import { RemoveWalletHandler, WalletHandler } from './wallet-handler';
import { ListHandler } from './list-handler';
import { CancelHandler } from './conversation-handler';
import { BotContext } from '../middleware/session';
import { logger } from '../../utils/logger';

export interface BotCommandInfo {
  command: string;
  description: string;
}

export class HandlerRegistry {
  private handlers: Map<string, BaseCommandHandler> = new Map();

  constructor(private readonly deps: HandlerDeps) {}

  registerHandler(handler: BaseCommandHandler): void {
    this.handlers.set(handler.commandName, handler);
  }

  getHandler(commandName: string): BaseCommandHandler | undefined {
    return this.handlers.get(commandName);
  }

  registerCoreHandlers(): void {
    this.registerHandler(new StartHandler(this.deps));
    this.registerHandler(new StartHandler(this.deps, 'help'));
  }

  registerCommandHandlers(): void {
    this.registerHandler(new SubscribeHandler(this.deps));
    this.registerHandler(new UnsubscribeHandler(this.deps));
    this.registerHandler(new WalletHandler(this.deps));
    this.registerHandler(new RemoveWalletHandler(this.deps));
    this.registerHandler(new ListHandler(this.deps));
    this.registerHandler(new CancelHandler());
  }

  /** Registers every handler on the bot; commands must precede text handlers. */
  attach(bot: Telegraf<BotContext>): void {
    if (this.handlers.size === 0) {
      this.registerCoreHandlers();
      this.registerCommandHandlers();
    }

    for (const handler of this.handlers.values()) {
      handler.register(bot);
    }
    logger.info(`Initialized ${this.handlers.size} command handlers`);
  }

  getAvailableCommands(): string[] {
    return Array.from(this.handlers.keys());
  }

  getBotCommands(): BotCommandInfo[] {
    return Array.from(this.handlers.values()).map(handler => ({
      command: handler.commandName,
      description: handler.description,
    }));
  }
}
