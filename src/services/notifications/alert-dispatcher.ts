import { Telegram } from 'telegraf';
import { NotificationError, getErrorMessage } from '@/utils/error-handler';
import { logger } from '@/utils/logger';

export interface MessageTransport {
  send(recipientId: number, message: string): Promise<void>;
}

export interface DispatchResult {
  delivered: number[];
  failed: number[];
}

type TelegramSender = Pick<Telegram, 'sendMessage'>;

export class TelegramTransport implements MessageTransport {
  constructor(private readonly telegram: TelegramSender) {}

  async send(recipientId: number, message: string): Promise<void> {
    try {
      await this.telegram.sendMessage(recipientId, message, {
        link_preview_options: { is_disabled: true },
      });
    } catch (error) {
      throw new NotificationError(`Telegram delivery to ${recipientId} failed: ${getErrorMessage(error)}`);
    }
  }
}

/**
 * Sends one message to many recipients. A failed delivery is logged and
 * recorded; it never stops delivery to the rest.
 */
export class AlertDispatcher {
  constructor(private readonly transport: MessageTransport) {}

  async dispatch(recipients: readonly number[], message: string): Promise<DispatchResult> {
    const result: DispatchResult = { delivered: [], failed: [] };

    for (const recipientId of recipients) {
      try {
        await this.transport.send(recipientId, message);
        result.delivered.push(recipientId);
      } catch (error) {
        logger.error('Failed to deliver alert', {
          recipientId,
          error: getErrorMessage(error),
        });
        result.failed.push(recipientId);
      }
    }

    return result;
  }
}
