import { Logger } from "@nestjs/common";
import { describe, expect, it } from "vitest";

import { InMemoryOwnerRepository } from "../src/repository/memory.repository.js";
import { loadSampleOwners, seedOwners } from "../src/seed.js";
import { RegistryService } from "../src/services/registry.service.js";

describe("seed", () => {
  it("loads the bundled sample owners", async () => {
    const owners = await loadSampleOwners();

    expect(owners).toHaveLength(6);
    expect(owners[0]).toEqual({
      ownerId: "STU001",
      displayName: "John Doe",
      vehicleDescriptor: "Silver",
      plate: "ABC1234",
    });
  });

  it("registers samples once and reports duplicates on a re-run", async () => {
    const registry = new RegistryService(new InMemoryOwnerRepository());
    const owners = await loadSampleOwners();
    const logger = new Logger("SeedTest");

    const first = await seedOwners(registry, owners, logger);
    const second = await seedOwners(registry, owners, logger);

    expect(first.every((outcome) => outcome.result.registered)).toBe(true);
    expect(second.map((outcome) => outcome.result.registered)).toEqual([false, false, false, false, false, false]);
    expect(second[0]?.result).toMatchObject({ registered: false, reason: "duplicate_owner_id" });
    await expect(registry.listOwners()).resolves.toHaveLength(6);
  });
});
