/**
 * Dependency wiring.
 * Constructs all services with their dependencies.
 * Production passes Supabase repositories; tests pass the in-memory mocks.
 */

import type { IEntityRepository } from './repositories/IEntityRepository.js';
import type { ISchemaRepository } from './repositories/ISchemaRepository.js';
import type { IFieldValueRepository } from './repositories/IFieldValueRepository.js';
import type { IReferenceRepository } from './repositories/IReferenceRepository.js';
import type { IActorRepository } from './repositories/IActorRepository.js';
import type { IBackupRepository } from './repositories/IBackupRepository.js';
import type { IActivityRepository } from './repositories/IActivityRepository.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { Middleware } from './middleware/pipeline.js';
import type { AppConfig } from './config.js';
import { DEFAULT_CONFIG } from './config.js';
import { ActorService } from './services/ActorService.js';
import { EntityService } from './services/EntityService.js';
import { FieldSchemaWalker } from './services/FieldSchemaWalker.js';
import { ValueTransformer } from './services/ValueTransformer.js';
import { ConflictAnalyzer } from './services/ConflictAnalyzer.js';
import { BackupService } from './services/BackupService.js';
import { CloneService, type CloneObserver } from './services/CloneService.js';
import { PreviewService } from './services/PreviewService.js';
import { ActivityService } from './services/ActivityService.js';
import { createAuthMiddleware } from './middleware/authenticate.js';
import { createLoggingMiddleware } from './middleware/logging.js';

export interface Container {
  config: AppConfig;
  actorService: ActorService;
  entityService: EntityService;
  walker: FieldSchemaWalker;
  transformer: ValueTransformer;
  analyzer: ConflictAnalyzer;
  backupService: BackupService;
  cloneService: CloneService;
  previewService: PreviewService;
  activityService: ActivityService;
  logProvider: ILogProvider;
  authenticate: Middleware;
  logging: Middleware;
}

export interface ContainerDeps {
  entityRepo: IEntityRepository;
  schemaRepo: ISchemaRepository;
  fieldValueRepo: IFieldValueRepository;
  referenceRepo: IReferenceRepository;
  actorRepo: IActorRepository;
  backupRepo: IBackupRepository;
  activityRepo: IActivityRepository;
  logProvider: ILogProvider;
  config?: AppConfig;
  /** Extra observers notified around every clone, after the activity log. */
  observers?: CloneObserver[];
}

/**
 * Services hold per-instance state (the walker's report cache), so a container
 * should live no longer than the unit of work it serves.
 */
export function createContainer(deps: ContainerDeps): Container {
  const config = deps.config ?? DEFAULT_CONFIG;

  const actorService = new ActorService(deps.actorRepo);
  const entityService = new EntityService(deps.entityRepo);
  const walker = new FieldSchemaWalker(deps.entityRepo, deps.schemaRepo, deps.fieldValueRepo);
  const transformer = new ValueTransformer(deps.referenceRepo);
  const analyzer = new ConflictAnalyzer();
  const backupService = new BackupService(
    deps.backupRepo,
    deps.fieldValueRepo,
    walker,
    deps.logProvider,
    config.backup
  );
  const activityService = new ActivityService(deps.activityRepo);
  const cloneService = new CloneService(
    deps.entityRepo,
    deps.fieldValueRepo,
    walker,
    transformer,
    backupService,
    deps.logProvider,
    config,
    [activityService, ...(deps.observers ?? [])]
  );
  const previewService = new PreviewService(
    deps.entityRepo,
    entityService,
    walker,
    analyzer,
    config
  );
  const authenticate = createAuthMiddleware(actorService);
  const logging = createLoggingMiddleware(deps.logProvider);

  return {
    config,
    actorService,
    entityService,
    walker,
    transformer,
    analyzer,
    backupService,
    cloneService,
    previewService,
    activityService,
    logProvider: deps.logProvider,
    authenticate,
    logging,
  };
}
