// ============================================================================
// Tests: Application Configuration — loadConfig
// ============================================================================

import { describe, test, expect } from 'vitest';
import { loadConfig } from '../config.js';

const required = {
  GMAIL_USER: 'sender@example.org',
  GOOGLE_SERVICE_ACCOUNT_EMAIL: 'mailer@project.iam.gserviceaccount.com',
};

describe('loadConfig', () => {
  test('applies defaults', () => {
    const config = loadConfig(required);

    expect(config.gmail).toEqual({
      delegatedUser: 'sender@example.org',
      serviceAccountEmail: 'mailer@project.iam.gserviceaccount.com',
      scopes: ['https://mail.google.com/'],
    });
    expect(config.firestore).toEqual({
      projectId: undefined,
      draftsCollection: 'email_drafts',
      followupsCollection: 'email_followups',
      trackingCollection: 'email_opens',
    });
    expect(config.features).toEqual({
      tracking: false,
      autoFollowup: false,
      appendSignature: true,
      defaultSendMode: 'draft',
      testSubjectPrefix: '[TEST] ',
    });
    expect(config.server.port).toBe(8080);
    expect(config.isDev).toBe(true);
  });

  test('throws when a required variable is missing', () => {
    expect(() => loadConfig({ GMAIL_USER: 'sender@example.org' })).toThrow(
      'Missing required environment variable: GOOGLE_SERVICE_ACCOUNT_EMAIL',
    );
  });

  test('enables tracking and auto follow-up only with their service URLs', () => {
    const config = loadConfig({
      ...required,
      MAIL_TRACKER_URL: 'https://tracker.test/',
      AUTO_FOLLOWUP_URL: 'https://followup.test',
    });

    expect(config.services.mailTrackerUrl).toBe('https://tracker.test');
    expect(config.features.tracking).toBe(true);
    expect(config.features.autoFollowup).toBe(true);
  });

  test('a false flag wins over a configured URL', () => {
    const config = loadConfig({
      ...required,
      MAIL_TRACKER_URL: 'https://tracker.test',
      ENABLE_TRACKING: 'false',
    });

    expect(config.features.tracking).toBe(false);
  });

  test('parses scopes, send mode, port and environment', () => {
    const config = loadConfig({
      ...required,
      GMAIL_SCOPES: 'https://mail.google.com/, https://www.googleapis.com/auth/gmail.settings.basic',
      DEFAULT_SEND_MODE: 'send',
      PORT: '3000',
      APP_ENV: 'production',
      APPEND_SIGNATURE: '0',
    });

    expect(config.gmail.scopes).toEqual([
      'https://mail.google.com/',
      'https://www.googleapis.com/auth/gmail.settings.basic',
    ]);
    expect(config.features.defaultSendMode).toBe('send');
    expect(config.features.appendSignature).toBe(false);
    expect(config.server.port).toBe(3000);
    expect(config.isDev).toBe(false);
  });

  test('rejects an unknown send mode', () => {
    expect(() => loadConfig({ ...required, DEFAULT_SEND_MODE: 'later' })).toThrow(
      'DEFAULT_SEND_MODE must be "draft" or "send", got "later"',
    );
  });
});
