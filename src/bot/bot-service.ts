import { Telegraf, Telegram, session } from 'telegraf';
import { ConversationHandler, HandlerDeps, HandlerRegistry } from './handlers';
import { BotContext, BotSession, createSession } from './middleware/session';
import { getErrorMessage, handleError } from '../utils/error-handler';
import { logger } from '../utils/logger';

export interface BotConfig {
  token: string;
  environment: string;
}

export class BotService {
  private readonly bot: Telegraf<BotContext>;
  private readonly handlerRegistry: HandlerRegistry;
  private readonly conversation: ConversationHandler;
  private launch: Promise<void> | null = null;

  constructor(
    private readonly config: BotConfig,
    deps: HandlerDeps
  ) {
    this.bot = new Telegraf<BotContext>(config.token);
    this.handlerRegistry = new HandlerRegistry(deps);
    this.conversation = new ConversationHandler(deps);

    this.setupMiddleware();
    this.setupHandlers();
    this.setupErrorHandling();
  }

  get telegram(): Telegram {
    return this.bot.telegram;
  }

  get isRunning(): boolean {
    return this.launch !== null;
  }

  async start(): Promise<void> {
    if (this.launch) {
      logger.warn('Bot is already running');
      return;
    }

    logger.info(`Starting PerpWatch bot in ${this.config.environment} mode`);

    await this.bot.telegram.setMyCommands(this.handlerRegistry.getBotCommands());

    // launch() settles only when polling stops.
    this.launch = this.bot
      .launch({ dropPendingUpdates: true }, () => logger.info('Polling started'))
      .catch((error: unknown) => {
        logger.error('Bot polling stopped with an error', { error: getErrorMessage(error) });
      });
  }

  async stop(reason = 'shutdown'): Promise<void> {
    if (!this.launch) {
      return;
    }

    logger.info('Stopping bot...', { reason });
    this.bot.stop(reason);
    await this.launch;
    this.launch = null;
    logger.info('Bot stopped');
  }

  private setupMiddleware(): void {
    this.bot.use(session<BotSession, BotContext>({ defaultSession: () => createSession() }));
  }

  private setupHandlers(): void {
    this.handlerRegistry.attach(this.bot);

    this.bot.on('text', async ctx => {
      await this.conversation.handleText(ctx, ctx.message.text);
    });
  }

  private setupErrorHandling(): void {
    this.bot.catch((error, ctx) => {
      handleError(error, { updateType: ctx.updateType, userId: ctx.from?.id });
    });
  }
}
