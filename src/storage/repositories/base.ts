/**
 * Base Repository Interface
 *
 * The contract shared by id-addressed repositories. Business logic works
 * with domain models and never sees Drizzle rows, so services can be tested
 * against an in-memory database or a hand-written fake.
 */

/**
 * Generic repository interface defining standard CRUD operations.
 *
 * @typeParam T - The domain model type returned by the repository
 * @typeParam CreateInput - The type for creating new entities
 * @typeParam UpdateInput - The type for updating entities (typically partial)
 */
export interface Repository<T, CreateInput, UpdateInput> {
  /**
   * @returns The domain model if found, or null if not found
   */
  findById(id: string): Promise<T | null>;

  findAll(): Promise<T[]>;

  /**
   * @returns The created domain model with generated id and timestamps
   */
  create(input: CreateInput): Promise<T>;

  /**
   * Updates only the fields present in `input`.
   *
   * @throws Error if the entity with the given id does not exist
   */
  update(id: string, input: UpdateInput): Promise<T>;

  /**
   * @throws Error if the entity with the given id does not exist
   */
  delete(id: string): Promise<void>;
}
