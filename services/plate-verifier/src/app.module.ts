import { Module, ValidationPipe } from "@nestjs/common";
import { APP_FILTER, APP_PIPE } from "@nestjs/core";

import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { AttemptsController } from "./controllers/attempts.controller.js";
import { HealthController } from "./controllers/health.controller.js";
import { OwnersController } from "./controllers/owners.controller.js";
import { VerifyController } from "./controllers/verify.controller.js";
import { PersistenceFailureFilter } from "./filters/persistence-failure.filter.js";
import type { AttemptRepository } from "./repository/attempt.repository.js";
import { InMemoryAttemptRepository, InMemoryOwnerRepository } from "./repository/memory.repository.js";
import type { OwnerRepository } from "./repository/owner.repository.js";
import { PostgresDatabase } from "./repository/postgres.database.js";
import { PostgresAttemptRepository, PostgresOwnerRepository } from "./repository/postgres.repository.js";
import { RegistryService } from "./services/registry.service.js";
import { VerificationService } from "./services/verification.service.js";
import { APP_CONFIG, ATTEMPT_REPOSITORY, OWNER_REPOSITORY, POSTGRES_DATABASE } from "./tokens.js";

const configProvider = {
  provide: APP_CONFIG,
  useFactory: () => loadConfig(),
};

const databaseProvider = {
  provide: POSTGRES_DATABASE,
  inject: [APP_CONFIG],
  useFactory: async (config: AppConfig): Promise<PostgresDatabase | null> => {
    if (!config.database.url) {
      return null;
    }
    const database = PostgresDatabase.fromConfig(config.database);
    await database.open();
    return database;
  },
};

const ownerRepositoryProvider = {
  provide: OWNER_REPOSITORY,
  inject: [POSTGRES_DATABASE],
  useFactory: (database: PostgresDatabase | null): OwnerRepository =>
    database ? new PostgresOwnerRepository(database) : new InMemoryOwnerRepository(),
};

const attemptRepositoryProvider = {
  provide: ATTEMPT_REPOSITORY,
  inject: [POSTGRES_DATABASE],
  useFactory: (database: PostgresDatabase | null): AttemptRepository =>
    database ? new PostgresAttemptRepository(database) : new InMemoryAttemptRepository(),
};

@Module({
  imports: [],
  controllers: [VerifyController, OwnersController, AttemptsController, HealthController],
  providers: [
    configProvider,
    databaseProvider,
    ownerRepositoryProvider,
    attemptRepositoryProvider,
    RegistryService,
    VerificationService,
    {
      provide: APP_PIPE,
      useFactory: () => new ValidationPipe({ whitelist: true, transform: true }),
    },
    {
      provide: APP_FILTER,
      useClass: PersistenceFailureFilter,
    },
  ],
})
export class AppModule {}
