/**
 * Production container: Supabase storage, Axiom logging when configured,
 * webhook notifications when configured.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig } from './config.js';
import { getSupabaseClient } from './db.js';
import { SupabaseSubmissionRepository } from './repositories/SupabaseSubmissionRepository.js';
import { SupabaseLineageRepository } from './repositories/SupabaseLineageRepository.js';
import { SupabaseOutcomeRepository } from './repositories/SupabaseOutcomeRepository.js';
import { SupabaseCreditLedgerRepository } from './repositories/SupabaseCreditLedgerRepository.js';
import { SupabaseProfileRepository } from './repositories/SupabaseProfileRepository.js';
import { SupabaseChainCommitRepository } from './repositories/SupabaseChainCommitRepository.js';
import {
  AxiomLogProvider,
  ConsoleLogProvider,
  LogNotificationProvider,
  WebhookNotificationProvider,
  type ILogProvider,
  type INotificationProvider,
} from './providers/index.js';

let cached: Container | null = null;

export function getProductionContainer(): Container {
  if (cached) return cached;

  const config = loadConfig();
  if (!config.supabase) {
    throw new Error(
      'Missing required environment variables: SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY'
    );
  }

  const db = getSupabaseClient(config.supabase.url, config.supabase.serviceRoleKey);

  const logProvider: ILogProvider = config.axiom
    ? new AxiomLogProvider({ ...config.axiom, minLevel: config.logLevel })
    : new ConsoleLogProvider({ outputToConsole: true, minLevel: config.logLevel });

  const notificationProvider: INotificationProvider = config.notifyWebhookUrl
    ? new WebhookNotificationProvider({ url: config.notifyWebhookUrl, logProvider })
    : new LogNotificationProvider(logProvider);

  cached = createContainer({
    submissionRepo: new SupabaseSubmissionRepository(db),
    lineageRepo: new SupabaseLineageRepository(db),
    outcomeRepo: new SupabaseOutcomeRepository(db),
    ledgerRepo: new SupabaseCreditLedgerRepository(db),
    profileRepo: new SupabaseProfileRepository(db),
    commitRepo: new SupabaseChainCommitRepository(db),
    logProvider,
    notificationProvider,
    scoring: config.scoring,
  });

  return cached;
}
