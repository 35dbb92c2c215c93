/**
 * Dependency wiring.
 * Constructs all services with their dependencies.
 * Production passes Supabase repositories; tests pass in-memory mocks.
 */

import type { ISubmissionRepository } from './repositories/ISubmissionRepository.js';
import type { ILineageRepository } from './repositories/ILineageRepository.js';
import type { IOutcomeRepository } from './repositories/IOutcomeRepository.js';
import type { ICreditLedgerRepository } from './repositories/ICreditLedgerRepository.js';
import type { IProfileRepository } from './repositories/IProfileRepository.js';
import type { IChainCommitRepository } from './repositories/IChainCommitRepository.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { INotificationProvider } from './providers/INotificationProvider.js';
import type { Middleware } from './middleware/pipeline.js';
import type { ScoringConfig } from './config.js';
import { DEFAULT_SCORING } from './config.js';
import { systemClock, type Clock } from './types/common.js';
import { SubmissionService, generateTrackingId } from './services/SubmissionService.js';
import { LineageService } from './services/LineageService.js';
import { OutcomeService } from './services/OutcomeService.js';
import { BackpropagationService } from './services/BackpropagationService.js';
import { ReputationService } from './services/ReputationService.js';
import { TimeCapsuleService } from './services/TimeCapsuleService.js';
import { CoachService } from './services/CoachService.js';
import { ChainLock } from './services/ChainLock.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import { createErrorHandler } from './middleware/error-handler.js';

export interface Container {
  submissionService: SubmissionService;
  lineageService: LineageService;
  outcomeService: OutcomeService;
  backpropagationService: BackpropagationService;
  reputationService: ReputationService;
  timeCapsuleService: TimeCapsuleService;
  coachService: CoachService;
  logProvider: ILogProvider;
  logging: Middleware;
  errorHandler: Middleware;
}

export function createContainer(deps: {
  submissionRepo: ISubmissionRepository;
  lineageRepo: ILineageRepository;
  outcomeRepo: IOutcomeRepository;
  ledgerRepo: ICreditLedgerRepository;
  profileRepo: IProfileRepository;
  commitRepo: IChainCommitRepository;
  logProvider: ILogProvider;
  notificationProvider: INotificationProvider;
  scoring?: Partial<ScoringConfig>;
  clock?: Clock;
  nextTrackingId?: () => string;
}): Container {
  const scoring: ScoringConfig = { ...DEFAULT_SCORING, ...deps.scoring };
  const clock = deps.clock ?? systemClock;

  const submissionService = new SubmissionService(
    deps.submissionRepo,
    deps.logProvider,
    clock,
    deps.nextTrackingId ?? generateTrackingId
  );
  const backpropagationService = new BackpropagationService(
    deps.lineageRepo,
    deps.outcomeRepo,
    deps.submissionRepo,
    deps.logProvider,
    { depthDecayFactor: scoring.depthDecayFactor, ancestorLimit: scoring.ancestorLimit },
    clock
  );
  const reputationService = new ReputationService(
    deps.submissionRepo,
    deps.outcomeRepo,
    deps.ledgerRepo,
    deps.lineageRepo,
    deps.profileRepo,
    deps.notificationProvider,
    deps.logProvider,
    { materialChangeThreshold: scoring.materialChangeThreshold },
    clock
  );
  const lineageService = new LineageService(
    deps.lineageRepo,
    deps.commitRepo,
    submissionService,
    backpropagationService,
    reputationService,
    new ChainLock(),
    deps.logProvider,
    { ancestorLimit: scoring.ancestorLimit },
    clock
  );
  const outcomeService = new OutcomeService(
    deps.outcomeRepo,
    deps.commitRepo,
    submissionService,
    lineageService,
    backpropagationService,
    reputationService,
    deps.notificationProvider,
    deps.logProvider,
    clock
  );
  const timeCapsuleService = new TimeCapsuleService(
    deps.submissionRepo,
    deps.outcomeRepo,
    deps.lineageRepo,
    deps.ledgerRepo
  );
  const coachService = new CoachService(reputationService);

  return {
    submissionService,
    lineageService,
    outcomeService,
    backpropagationService,
    reputationService,
    timeCapsuleService,
    coachService,
    logProvider: deps.logProvider,
    logging: createLoggingMiddleware(deps.logProvider),
    errorHandler: createErrorHandler(deps.logProvider),
  };
}
