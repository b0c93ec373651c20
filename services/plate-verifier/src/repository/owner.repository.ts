export interface NewOwner {
  ownerId: string;
  displayName: string;
  vehicleDescriptor: string;
  plateKey: string;
}

export interface OwnerRecord extends NewOwner {
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Registry of plate owners. `ownerId` and `plateKey` are each unique; plate
 * keys arrive already normalized and are matched exactly.
 */
export interface OwnerRepository {
  /** @throws DuplicateKeyError when either unique key is taken. */
  insert(owner: NewOwner): Promise<OwnerRecord>;
  findByPlate(plateKey: string): Promise<OwnerRecord | undefined>;
  /** Insertion order. */
  listAll(): Promise<OwnerRecord[]>;
  remove(ownerId: string): Promise<boolean>;
}
