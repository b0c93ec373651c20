import "reflect-metadata";

import { readFile } from "node:fs/promises";

import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { z } from "zod";

import { AppModule } from "./app.module.js";
import { RegistryService } from "./services/registry.service.js";
import type { RegisterOwnerInput, RegistrationResult } from "./types.js";

const sampleOwnersSchema = z.array(
  z.object({
    ownerId: z.string().min(1),
    displayName: z.string().min(1),
    vehicleDescriptor: z.string().optional(),
    plate: z.string().min(1),
  }),
);

export const DEFAULT_SAMPLE_OWNERS = new URL("../data/sample-owners.json", import.meta.url);

export interface SeedOutcome {
  ownerId: string;
  result: RegistrationResult;
}

export async function loadSampleOwners(location: URL | string = DEFAULT_SAMPLE_OWNERS): Promise<RegisterOwnerInput[]> {
  const raw = await readFile(location, "utf8");
  return sampleOwnersSchema.parse(JSON.parse(raw));
}

/**
 * Registers each owner in order. Duplicates are reported, not fatal, so the
 * seed can be re-run against a populated store.
 */
export async function seedOwners(
  registry: RegistryService,
  owners: RegisterOwnerInput[],
  logger: Logger = new Logger("Seed"),
): Promise<SeedOutcome[]> {
  const outcomes: SeedOutcome[] = [];
  for (const owner of owners) {
    const result = await registry.registerOwner(owner);
    if (result.registered) {
      logger.log(`+ ${owner.ownerId}: ${owner.displayName} (${result.owner.plateKey})`);
    } else {
      logger.warn(`- ${owner.ownerId}: ${result.message}`);
    }
    outcomes.push({ ownerId: owner.ownerId, result });
  }
  return outcomes;
}

async function main() {
  const logger = new Logger("Seed");
  const app = await NestFactory.createApplicationContext(AppModule);
  try {
    const registry = app.get(RegistryService);
    const outcomes = await seedOwners(registry, await loadSampleOwners(process.argv[2]), logger);
    const registered = outcomes.filter((outcome) => outcome.result.registered).length;
    const total = (await registry.listOwners()).length;
    logger.log(`Registered ${registered} of ${outcomes.length} sample owners; registry holds ${total}`);
  } finally {
    await app.close();
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    // eslint-disable-next-line no-console
    console.error("Seeding failed", error);
    process.exitCode = 1;
  });
}
