/**
 * Production container: Supabase repositories and configuration from the environment.
 * Logs go to Axiom when it is configured and to the console otherwise.
 */

import { createContainer, type Container, type ContainerDeps } from './container.js';
import { loadConfig } from './config.js';
import { getSupabaseClient } from './db.js';
import { SupabaseEntityRepository } from './repositories/SupabaseEntityRepository.js';
import { SupabaseSchemaRepository } from './repositories/SupabaseSchemaRepository.js';
import { SupabaseFieldValueRepository } from './repositories/SupabaseFieldValueRepository.js';
import { SupabaseReferenceRepository } from './repositories/SupabaseReferenceRepository.js';
import { SupabaseActorRepository } from './repositories/SupabaseActorRepository.js';
import { SupabaseBackupRepository } from './repositories/SupabaseBackupRepository.js';
import { SupabaseActivityRepository } from './repositories/SupabaseActivityRepository.js';
import { AxiomLogProvider, ConsoleLogProvider } from './providers/index.js';
import type { ILogProvider, LogLevel } from './providers/index.js';

let deps: ContainerDeps | null = null;

/**
 * A fresh container per request. Repositories, configuration and the log
 * provider are built once per cold start and shared; services are not, so no
 * cached field report survives past the request that built it.
 */
export function createProductionContainer(): Container {
  return createContainer(getProductionDeps());
}

function getProductionDeps(): ContainerDeps {
  if (deps) return deps;

  const config = loadConfig(process.env);
  const db = getSupabaseClient();

  deps = {
    entityRepo: new SupabaseEntityRepository(db),
    schemaRepo: new SupabaseSchemaRepository(db),
    fieldValueRepo: new SupabaseFieldValueRepository(db),
    referenceRepo: new SupabaseReferenceRepository(db),
    actorRepo: new SupabaseActorRepository(db),
    backupRepo: new SupabaseBackupRepository(db),
    activityRepo: new SupabaseActivityRepository(db),
    logProvider: createLogProvider(config.logLevel),
    config,
  };

  return deps;
}

function createLogProvider(minLevel: LogLevel): ILogProvider {
  const apiToken = process.env.AXIOM_API_KEY;
  const dataset = process.env.AXIOM_DATASET;

  if (apiToken && dataset) {
    return new AxiomLogProvider({ apiToken, dataset, minLevel });
  }
  return new ConsoleLogProvider({ outputToConsole: true, minLevel });
}
