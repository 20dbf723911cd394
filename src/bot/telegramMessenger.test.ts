import { describe, it, expect } from 'vitest';
import { urlKeyboard } from './telegramMessenger';

describe('urlKeyboard', () => {
  it('builds a single url button row', () => {
    const markup = urlKeyboard({ text: 'TRADE NOW - ETH 🔥', url: 'https://example.com/trade/ETH-USDT' });
    expect(markup.reply_markup).toMatchObject({
      inline_keyboard: [[{ text: 'TRADE NOW - ETH 🔥', url: 'https://example.com/trade/ETH-USDT' }]]
    });
  });
});
