import { Inject, Injectable, Logger } from "@nestjs/common";

import { DuplicateKeyError } from "../errors.js";
import { normalizePlate } from "../normalizer.js";
import type { OwnerRecord, OwnerRepository } from "../repository/owner.repository.js";
import { OWNER_REPOSITORY } from "../tokens.js";
import type { RegisterOwnerInput, RegistrationResult } from "../types.js";

@Injectable()
export class RegistryService {
  private readonly logger = new Logger(RegistryService.name);

  constructor(@Inject(OWNER_REPOSITORY) private readonly owners: OwnerRepository) {}

  async registerOwner(input: RegisterOwnerInput): Promise<RegistrationResult> {
    const plateKey = normalizePlate(input.plate);
    if (!plateKey) {
      return { registered: false, reason: "invalid_plate", message: "Plate must not be blank" };
    }

    try {
      const owner = await this.owners.insert({
        ownerId: input.ownerId,
        displayName: input.displayName,
        vehicleDescriptor: input.vehicleDescriptor ?? "",
        plateKey,
      });
      this.logger.log(`Registered owner ${owner.ownerId} with plate ${owner.plateKey}`);
      return { registered: true, owner };
    } catch (error) {
      if (error instanceof DuplicateKeyError) {
        this.logger.warn(`Rejected registration of ${input.ownerId}: ${error.message}`);
        return {
          registered: false,
          reason: error.field === "ownerId" ? "duplicate_owner_id" : "duplicate_plate_key",
          message: error.message,
        };
      }
      throw error;
    }
  }

  async listOwners(): Promise<OwnerRecord[]> {
    return this.owners.listAll();
  }

  async findOwnerByPlate(plate: string): Promise<OwnerRecord | undefined> {
    const plateKey = normalizePlate(plate);
    return plateKey ? this.owners.findByPlate(plateKey) : undefined;
  }

  async removeOwner(ownerId: string): Promise<boolean> {
    const removed = await this.owners.remove(ownerId);
    if (removed) {
      this.logger.log(`Removed owner ${ownerId}`);
    }
    return removed;
  }
}
