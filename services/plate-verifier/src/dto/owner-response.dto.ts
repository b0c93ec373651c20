import type { OwnerRecord } from "../repository/owner.repository.js";

export class OwnerResponseDto {
  ownerId!: string;
  displayName!: string;
  vehicleDescriptor!: string;
  plateKey!: string;
  createdAt!: string;
  updatedAt!: string;
}

export function toOwnerResponse(owner: OwnerRecord): OwnerResponseDto {
  return {
    ownerId: owner.ownerId,
    displayName: owner.displayName,
    vehicleDescriptor: owner.vehicleDescriptor,
    plateKey: owner.plateKey,
    createdAt: owner.createdAt.toISOString(),
    updatedAt: owner.updatedAt.toISOString(),
  };
}
