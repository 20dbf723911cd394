import { describe, it, expect } from 'vitest';
import {
  DEFAULT_TEMPLATE,
  assertCaptionFits,
  renderCalculationPreview,
  renderSummaryBox,
  renderTemplate,
  templateVars,
  unknownPlaceholders,
  validateTemplate,
  visibleLength
} from './templateService';
import { computeSignal } from './pricingEngine';
import { ValidationError } from '../lib/errors';

const signal = computeSignal('ETH', 3450, 3300, 3, { decimals: 0 });
const ctx = {
  sequenceId: '0007',
  sender: 'alice',
  tradeUrl: 'https://example.com/trade?t=ETH&src=tg',
  publishedAt: '15 Jan 2025, 03:30 PM',
  challengeUrl: '',
  leaderboardUrl: ''
};

describe('renderTemplate', () => {
  it('fills the default template', () => {
    const caption = renderTemplate(DEFAULT_TEMPLATE, templateVars(signal, ctx));
    expect(caption.split('\n').slice(0, 6)).toEqual([
      '🚨 NEW CRYPTO TRADE ALERT 📈🔥',
      '',
      '🔹 TRADE: ETH LONG',
      '🔹 Pair: ETH/USDT',
      '🔹 Risk: HIGH',
      '🔹 Leverage: 3x'
    ]);
    expect(caption).toContain('🔸 Entry 2: $3375\n');
    expect(caption).toContain('🎯 Take Profit (TP) 2: $3637.5\n');
    expect(caption).toContain('🛑 Stop Loss (SL): $3300\n');
    expect(caption).toContain('🕰️ Holding time: 1–2 days\n');
  });

  it('frames the default caption with the challenge and leaderboard links', () => {
    const vars = templateVars(signal, {
      ...ctx,
      challengeUrl: 'https://example.com/challenge',
      leaderboardUrl: 'https://example.com/leaderboard'
    });
    const lines = renderTemplate(DEFAULT_TEMPLATE, vars).split('\n');
    expect(lines.slice(0, 3)).toEqual([
      '🏆 <a href="https://example.com/challenge">EXCLUSIVE TG TRADE CHALLENGE</a>',
      '',
      '🚨 NEW CRYPTO TRADE ALERT 📈🔥'
    ]);
    expect(lines.slice(-2)).toEqual(['', '<a href="https://example.com/leaderboard">CHECK THE LEADERBOARD 🚀</a>']);
  });

  it('drops link lines whose url is not configured', () => {
    const caption = renderTemplate(DEFAULT_TEMPLATE, templateVars(signal, ctx));
    expect(caption.split('\n').at(-1)).toBe(
      '⚠️ Disclaimer: Crypto assets are unregulated and extremely volatile. Losses are possible, and no regulatory recourse is available. Always DYOR before taking any trade.'
    );
    expect(renderTemplate('{ticker}\n\n\n{sl}', templateVars(signal, ctx))).toBe('ETH\n\n\n3300');
  });

  it('escapes urls and leaves unknown placeholders alone', () => {
    const out = renderTemplate('<a href="{trade_url}">#{sequence_id}</a> {nope}', templateVars(signal, ctx));
    expect(out).toBe('<a href="https://example.com/trade?t=ETH&amp;src=tg">#0007</a> {nope}');
  });
});

describe('validateTemplate', () => {
  it('trims and accepts known placeholders', () => {
    expect(validateTemplate('  {ticker} {sender}\n')).toBe('{ticker} {sender}');
  });

  it('names unknown placeholders', () => {
    expect(unknownPlaceholders('{ticker} {foo} {bar} {foo}')).toEqual(['foo', 'bar']);
    expect(() => validateTemplate('{ticker} {foo}')).toThrow('Unknown placeholder: {foo}.');
    expect(() => validateTemplate('   ')).toThrow(ValidationError);
  });
});

describe('caption length', () => {
  it('counts visible characters only', () => {
    expect(visibleLength('<b>ab</b> &amp;')).toBe(4);
  });

  it('rejects captions over the Telegram limit', () => {
    expect(() => assertCaptionFits('x'.repeat(1024))).not.toThrow();
    expect(() => assertCaptionFits('x'.repeat(1025))).toThrow('Caption is 1025 characters; Telegram allows 1024. Shorten the template with format.');
  });
});

describe('operator messages', () => {
  it('marks auto leverage in the preview', () => {
    const auto = computeSignal('SOL', 100, 50, null);
    const preview = renderCalculationPreview(auto, 'https://example.com/trade/SOL-USDT');
    expect(preview.split('\n')).toContain('Leverage: 2x (auto)');
    expect(preview.split('\n')[1]).toBe('Ticker: SOL LONG');
  });

  it('renders the summary box', () => {
    const box = renderSummaryBox(signal, ctx.publishedAt).split('\n');
    expect(box[0]).toBe('📊 <b>SUMMARY BOX</b>');
    expect(box).toContain('Average Entry: $3412.5');
    expect(box).toContain('Potential Profit: 19.78%');
  });
});
