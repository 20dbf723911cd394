/**
 * Telegram side of the desk: private text and photo messages go to the desk,
 * its replies go back to the same chat.
 */

import { type Context, Telegraf } from 'telegraf';
import { message } from 'telegraf/filters';
import { createLogger } from '../lib/logger';
import { errorMessage } from '../lib/errors';
import type { SignalDesk } from '../services/signalDesk';
import type { InboundMessage, Reply } from '../types/messaging';
import { urlKeyboard } from './telegramMessenger';

const log = createLogger('Bot');

export async function deliver(ctx: Context, replies: Reply[]): Promise<void> {
  for (const reply of replies) {
    if (reply.kind === 'text') {
      await ctx.reply(reply.text, reply.html ? { parse_mode: 'HTML' } : undefined);
    } else {
      await ctx.replyWithPhoto(reply.image, {
        caption: reply.caption,
        parse_mode: 'HTML',
        reply_markup: reply.button ? urlKeyboard(reply.button).reply_markup : undefined
      });
    }
  }
}

export function createBot(token: string): Telegraf {
  return new Telegraf(token);
}

/** Wire the desk into the bot's update handlers */
export function attachDesk(bot: Telegraf, desk: SignalDesk): void {
  const handle = async (ctx: Context, inbound: InboundMessage) => {
    const replies = await desk.handle(inbound);
    await deliver(ctx, replies);
  };

  bot.start(async (ctx) => {
    await handle(ctx, { userId: ctx.from.id, text: '/start' });
  });

  bot.on(message('text'), async (ctx) => {
    await handle(ctx, { userId: ctx.from.id, text: ctx.message.text });
  });

  bot.on(message('photo'), async (ctx) => {
    const sizes = ctx.message.photo;
    const largest = sizes[sizes.length - 1];
    if (!largest) return;
    await handle(ctx, { userId: ctx.from.id, imageId: largest.file_id });
  });

  bot.catch((err, ctx) => {
    log.error('Update handling failed', { updateId: ctx.update.update_id, error: errorMessage(err) });
  });
}
