import { describe, it, expect } from 'vitest';
import { validateEnvironment } from './envValidator';

describe('envValidator', () => {
  it('reports missing token and channel as errors', () => {
    const report = validateEnvironment({ NODE_ENV: 'development' });
    expect(report.errors).toEqual([
      'TELEGRAM_BOT_TOKEN is required (Bot credential from @BotFather)',
      'CHANNEL_ID is required (Broadcast channel (@name or numeric id) signals are posted to)'
    ]);
  });

  it('only warns about ADMIN_IDS outside production', () => {
    const report = validateEnvironment({ TELEGRAM_BOT_TOKEN: 'test-token', CHANNEL_ID: '@x' });
    expect(report.errors).toEqual([]);
    expect(report.warnings).toHaveLength(1);
    expect(report.warnings[0]).toMatch(/^ADMIN_IDS not set/);
  });

  it('requires ADMIN_IDS in production', () => {
    const report = validateEnvironment({ NODE_ENV: 'production', TELEGRAM_BOT_TOKEN: 'test-token', CHANNEL_ID: '@x' });
    expect(report.errors).toHaveLength(1);
    expect(report.errors[0]).toMatch(/^ADMIN_IDS is required/);
  });

  it('warns when the tracker is enabled without a public base url', () => {
    const report = validateEnvironment({
      TELEGRAM_BOT_TOKEN: 'test-token',
      CHANNEL_ID: '@x',
      ADMIN_IDS: '1',
      TRACKER_ENABLED: 'true'
    });
    expect(report.warnings).toEqual([
      'TRACKER_ENABLED is set without TRACKER_BASE_URL: buttons will point at http://localhost:8080.'
    ]);
  });

  it('rejects an unknown time zone', () => {
    const report = validateEnvironment({
      TELEGRAM_BOT_TOKEN: 'test-token',
      CHANNEL_ID: '@x',
      ADMIN_IDS: '1',
      TIMEZONE: 'Mars/Olympus'
    });
    expect(report.errors).toEqual(['TIMEZONE "Mars/Olympus" is not an IANA time zone']);
  });
});
