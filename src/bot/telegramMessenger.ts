/**
 * MessagingEndpoint over the Telegram Bot API (Telegraf's client).
 */

import { Markup, type Telegram } from 'telegraf';
import type { CallToAction, MessagingEndpoint } from '../types/messaging';

export function urlKeyboard(button: CallToAction) {
  return Markup.inlineKeyboard([[Markup.button.url(button.text, button.url)]]);
}

export class TelegramMessenger implements MessagingEndpoint {
  constructor(private readonly telegram: Telegram) {}

  async sendImageMessage(destination: string, image: string, caption: string, button?: CallToAction): Promise<number> {
    const sent = await this.telegram.sendPhoto(destination, image, {
      caption,
      parse_mode: 'HTML',
      reply_markup: button ? urlKeyboard(button).reply_markup : undefined
    });
    return sent.message_id;
  }

  async deleteMessage(destination: string, messageId: number): Promise<void> {
    await this.telegram.deleteMessage(destination, messageId);
  }

  async getMemberCount(destination: string): Promise<number> {
    return this.telegram.callApi('getChatMemberCount', { chat_id: destination });
  }
}
