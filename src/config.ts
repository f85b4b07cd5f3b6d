/**
 * Application Configuration
 *
 * Centralizes all environment variable access. Read once at start-up by
 * src/index.ts and handed to createAppContext; no other module reads
 * process.env.
 *
 * Environment variables:
 * - GMAIL_USER: Required mailbox user the service sends as (domain-wide delegation)
 * - GOOGLE_SERVICE_ACCOUNT_EMAIL: Required service account that signs the delegation assertion
 * - GMAIL_SCOPES: Comma-separated OAuth scopes (default https://mail.google.com/)
 * - GCP_PROJECT_ID: Firestore project (defaults to the ambient project)
 * - FIRESTORE_DRAFTS_COLLECTION / FIRESTORE_FOLLOWUPS_COLLECTION / FIRESTORE_TRACKING_COLLECTION
 * - MAIL_WRITER_URL / MAIL_TRACKER_URL / AUTO_FOLLOWUP_URL: Sibling service base URLs
 * - ENABLE_TRACKING / ENABLE_AUTO_FOLLOWUP / APPEND_SIGNATURE: Feature flags (default true)
 * - DEFAULT_SEND_MODE: 'draft' or 'send' for POST / (default draft)
 * - TEST_SUBJECT_PREFIX: Subject prefix for test-mode sends (default "[TEST] ")
 * - PORT: HTTP server port (default 8080)
 */

import 'dotenv/config';

export type SendMode = 'draft' | 'send';

export interface AppConfig {
  isDev: boolean;
  gmail: {
    delegatedUser: string;
    serviceAccountEmail: string;
    scopes: string[];
  };
  firestore: {
    projectId: string | undefined;
    draftsCollection: string;
    followupsCollection: string;
    trackingCollection: string;
  };
  services: {
    /** Follow-up copy generator */
    mailWriterUrl: string | undefined;
    /** Serves the tracking pixel */
    mailTrackerUrl: string | undefined;
    /** Schedules follow-ups after an initial send */
    autoFollowupUrl: string | undefined;
  };
  features: {
    tracking: boolean;
    autoFollowup: boolean;
    appendSignature: boolean;
    defaultSendMode: SendMode;
    testSubjectPrefix: string;
  };
  server: {
    port: number;
  };
}

type Env = Record<string, string | undefined>;

function requiredEnv(env: Env, key: string): string {
  const value = env[key];
  if (!value) {
    throw new Error(
      `Missing required environment variable: ${key}. ` +
      `Copy .env.example to .env and fill in the required values.`
    );
  }
  return value;
}

function optionalEnv(env: Env, key: string, fallback = ''): string {
  return env[key] ?? fallback;
}

function optionalUrl(env: Env, key: string): string | undefined {
  const value = env[key];
  return value ? value.replace(/\/+$/, '') : undefined;
}

function flag(env: Env, key: string, fallback: boolean): boolean {
  const value = env[key];
  if (value === undefined || value === '') return fallback;
  return ['true', '1', 'yes'].includes(value.toLowerCase());
}

function parseSendMode(value: string): SendMode {
  if (value === 'draft' || value === 'send') return value;
  throw new Error(`DEFAULT_SEND_MODE must be "draft" or "send", got "${value}"`);
}

export function loadConfig(env: Env = process.env): AppConfig {
  const services = {
    mailWriterUrl: optionalUrl(env, 'MAIL_WRITER_URL'),
    mailTrackerUrl: optionalUrl(env, 'MAIL_TRACKER_URL'),
    autoFollowupUrl: optionalUrl(env, 'AUTO_FOLLOWUP_URL'),
  };

  return {
    isDev: optionalEnv(env, 'APP_ENV', 'development') !== 'production',
    gmail: {
      delegatedUser: requiredEnv(env, 'GMAIL_USER'),
      serviceAccountEmail: requiredEnv(env, 'GOOGLE_SERVICE_ACCOUNT_EMAIL'),
      scopes: optionalEnv(env, 'GMAIL_SCOPES', 'https://mail.google.com/')
        .split(',')
        .map(s => s.trim())
        .filter(Boolean),
    },
    firestore: {
      projectId: env.GCP_PROJECT_ID || undefined,
      draftsCollection: optionalEnv(env, 'FIRESTORE_DRAFTS_COLLECTION', 'email_drafts'),
      followupsCollection: optionalEnv(env, 'FIRESTORE_FOLLOWUPS_COLLECTION', 'email_followups'),
      trackingCollection: optionalEnv(env, 'FIRESTORE_TRACKING_COLLECTION', 'email_opens'),
    },
    services,
    features: {
      // A flag without its service URL has nothing to talk to
      tracking: flag(env, 'ENABLE_TRACKING', true) && services.mailTrackerUrl !== undefined,
      autoFollowup: flag(env, 'ENABLE_AUTO_FOLLOWUP', true) && services.autoFollowupUrl !== undefined,
      appendSignature: flag(env, 'APPEND_SIGNATURE', true),
      defaultSendMode: parseSendMode(optionalEnv(env, 'DEFAULT_SEND_MODE', 'draft')),
      testSubjectPrefix: optionalEnv(env, 'TEST_SUBJECT_PREFIX', '[TEST] '),
    },
    server: {
      port: parseInt(optionalEnv(env, 'PORT', '8080'), 10),
    },
  };
}
