/**
 * Application Context
 *
 * Builds every long-lived dependency once at start-up from AppConfig:
 * Firestore client and stores, the mailbox registry (one delegated Gmail
 * client per sender), sibling-service clients and the draft service.
 * The HTTP layer receives the context; nothing else constructs clients.
 */

import { Firestore } from '@google-cloud/firestore';
import type { AppConfig } from './config.js';
import { CredentialExchanger, MailboxRegistry } from './email/index.js';
import { DraftService, HttpCopyGenerator, HttpFollowupScheduler, disabledScheduler } from './drafts/index.js';
import { FirestoreDraftStore, FirestoreFollowupStore, FirestoreTrackingStore } from './store/index.js';

export interface AppContext {
  config: AppConfig;
  firestore: Firestore;
  mailboxes: MailboxRegistry;
  drafts: DraftService;
}

export function createAppContext(config: AppConfig): AppContext {
  const firestore = new Firestore(
    config.firestore.projectId ? { projectId: config.firestore.projectId } : {},
  );

  const mailboxes = new MailboxRegistry({
    serviceAccountEmail: config.gmail.serviceAccountEmail,
    scopes: config.gmail.scopes,
    tokenSource: new CredentialExchanger(),
  });

  const scheduler = config.features.autoFollowup && config.services.autoFollowupUrl
    ? new HttpFollowupScheduler(config.services.autoFollowupUrl)
    : disabledScheduler;

  const drafts = new DraftService({
    drafts: new FirestoreDraftStore(firestore, config.firestore.draftsCollection),
    followups: new FirestoreFollowupStore(firestore, config.firestore.followupsCollection),
    tracking: new FirestoreTrackingStore(firestore, config.firestore.trackingCollection),
    mailboxes,
    scheduler,
    generator: new HttpCopyGenerator(config.services.mailWriterUrl),
    options: {
      defaultSender: config.gmail.delegatedUser,
      defaultSendMode: config.features.defaultSendMode,
      trackerUrl: config.features.tracking ? config.services.mailTrackerUrl : undefined,
      appendSignature: config.features.appendSignature,
      testSubjectPrefix: config.features.testSubjectPrefix,
    },
  });

  return { config, firestore, mailboxes, drafts };
}
