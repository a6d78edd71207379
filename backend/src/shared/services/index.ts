/**
 * Service container
 * One instance of each core service per process, built from configuration.
 */

import { config, type Config } from '@shared/config/index.js';
import type { Clock } from '@shared/utils/clock.js';
import { CredentialService } from './credentials/CredentialService.js';
import { IdentityService } from './identity/IdentityService.js';
import { SocialGraphService } from './social-graph/SocialGraphService.js';
import { ContentService } from './content/ContentService.js';
import { FeedService } from './feed/FeedService.js';
import { NotificationQueue, NotificationSender, transportFromConfig, type MailTransport } from './email/index.js';

export interface Services {
  config: Config;
  credentials: CredentialService;
  identity: IdentityService;
  graph: SocialGraphService;
  content: ContentService;
  feed: FeedService;
  notifications: NotificationSender;
  notificationQueue: NotificationQueue;
}

export interface ServiceOverrides {
  clock?: Clock;
  /** null disables email */
  transport?: MailTransport | null;
}

export function createServices(cfg: Config = config, overrides: ServiceOverrides = {}): Services {
  const { clock } = overrides;
  const credentials = new CredentialService({
    secretKey: cfg.secretKey,
    accessTokenExpires: cfg.accessTokenExpires,
    resetTokenExpires: cfg.resetTokenExpires,
    saltRounds: cfg.bcryptRounds,
    clock,
  });
  const notificationQueue = new NotificationQueue(cfg.notificationConcurrency);
  const transport = overrides.transport !== undefined ? overrides.transport : transportFromConfig(cfg);

  return {
    config: cfg,
    credentials,
    identity: new IdentityService({ credentials, clock }),
    graph: new SocialGraphService(),
    content: new ContentService({ clock }),
    feed: new FeedService(cfg.postsPerPage),
    notifications: new NotificationSender({
      transport,
      queue: notificationQueue,
      from: cfg.admins[0] ?? 'noreply@localhost',
    }),
    notificationQueue,
  };
}

let services: Services | null = null;

export function getServices(): Services {
  if (!services) {
    services = createServices();
  }
  return services;
}

/**
 * Replace the process-wide container. Passing nothing resets to a lazily built default.
 */
export function setServices(next: Services | null = null): void {
  services = next;
}
