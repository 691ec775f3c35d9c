import type { Context } from 'telegraf';
import { logger } from '@/lib/logger';
import type { DeliveryChannel, StatusMessage } from '@/interfaces/delivery-channel.interface';

const HTML = { parse_mode: 'HTML' } as const;

/**
 * Delivery channel bound to the chat of one incoming Telegram update
 */
export class TelegramDeliveryChannel implements DeliveryChannel {
  constructor(private readonly ctx: Context) {}

  async sendMessage(text: string): Promise<void> {
    await this.ctx.reply(text, HTML);
  }

  async sendStatus(text: string): Promise<StatusMessage> {
    const sent = await this.ctx.reply(text, HTML);
    const chatId = sent.chat.id;
    const messageId = sent.message_id;
    const telegram = this.ctx.telegram;

    return {
      edit: async (nextText: string) => {
        await telegram.editMessageText(chatId, messageId, undefined, nextText, HTML);
      },
      delete: async () => {
        await telegram.deleteMessage(chatId, messageId);
      },
    };
  }

  async sendVideo(filePath: string, caption: string): Promise<void> {
    logger.debug('Uploading video to Telegram', { filePath, chatId: this.ctx.chat?.id });
    await this.ctx.replyWithVideo({ source: filePath }, { caption, supports_streaming: true });
  }
}
