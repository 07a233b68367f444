/**
 * Base Repository Interface
 *
 * Generic CRUD contract for entity repositories. The scheduling stores
 * (schedules, history, sessions) implement the narrower interfaces in
 * `@/core/stores` instead, since the engine never lists or deletes them
 * wholesale.
 *
 * @typeParam T - The domain model type returned by the repository
 * @typeParam CreateInput - The type for creating new entities
 * @typeParam UpdateInput - The type for updating entities
 */
export interface Repository<T, CreateInput, UpdateInput> {
  /**
   * Retrieves an entity by its unique identifier.
   *
   * @returns The domain model if found, or null if not found
   */
  findById(id: string): Promise<T | null>;

  /**
   * Retrieves all live entities of this type.
   */
  findAll(): Promise<T[]>;

  create(input: CreateInput): Promise<T>;

  /**
   * Updates an existing entity with partial data.
   *
   * @throws Error if the entity with the given id does not exist
   */
  update(id: string, input: UpdateInput): Promise<T>;

  /**
   * Deletes an entity. Implementations may soft-delete.
   *
   * @throws Error if the entity with the given id does not exist
   */
  delete(id: string): Promise<void>;
}
