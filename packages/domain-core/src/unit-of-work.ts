/**
 * Unit of Work Pattern
 *
 * Tracks the entities a business transaction creates, changes and removes,
 * then writes all of it in one database transaction on commit.
 *
 * Entity kinds are a closed set described by a kinds interface that maps each
 * kind token to the entity type it tracks:
 * ```typescript
 * interface InboxEntities {
 *     user: User;
 *     message: Message;
 * }
 *
 * unitOfWork.registerDirty('user', user);        // ok
 * unitOfWork.registerDirty('message', user);     // does not compile
 * ```
 *
 * Registrations are kept as ordered sets keyed by entity identity: marking
 * the same entity twice before commit produces a single pending write that
 * carries the latest registered instance.
 */

/**
 * Identity of a persisted entity (integer primary key).
 */
export type EntityId = number;

/**
 * The kind tokens of a kinds interface.
 */
export type KindOf<TKinds> = keyof TKinds & string;

/**
 * Complete table of identity accessors, one per entity kind.
 */
export type IdentityTable<TKinds> = {
	readonly [K in keyof TKinds]: (entity: TKinds[K]) => EntityId;
};

/**
 * Number of rows written by a successful commit.
 */
export interface CommitSummary {
	readonly inserted: number;
	readonly updated: number;
	readonly deleted: number;
}

/**
 * Number of pending registrations per set.
 */
export interface PendingCounts {
	readonly new: number;
	readonly dirty: number;
	readonly removed: number;
}

/**
 * Unit of Work contract.
 *
 * Implementations must:
 * 1. Fail before writing anything when a pending kind has no mapper
 * 2. Write new, dirty and removed entities inside a single transaction
 * 3. Drop only the registrations a successful commit wrote; keep them all
 *    when it fails, along with any made while it was running
 */
export interface UnitOfWork<TKinds> {
	/**
	 * Register an entity to be inserted on commit. An entity pending removal
	 * is updated instead: its row still exists.
	 */
	registerNew<K extends KindOf<TKinds>>(kind: K, entity: TKinds[K]): void;

	/**
	 * Register an entity whose state changed and must be updated on commit.
	 * An entity already pending as new is left alone: its insert carries
	 * the latest state.
	 */
	registerDirty<K extends KindOf<TKinds>>(kind: K, entity: TKinds[K]): void;

	/**
	 * Register an entity to be deleted on commit. Cancels a pending insert
	 * or update of the same entity.
	 */
	registerRemoved<K extends KindOf<TKinds>>(kind: K, entity: TKinds[K]): void;

	/**
	 * Whether anything is waiting to be written.
	 */
	hasChanges(): boolean;

	/**
	 * Count pending registrations.
	 */
	pending(): PendingCounts;

	/**
	 * Write every pending registration atomically.
	 *
	 * @returns Counts of inserted, updated and deleted entities
	 * @throws MapperNotFoundError when a pending kind has no registered mapper (nothing is written)
	 * @throws ExecutionError when the store rejects a statement (the transaction is rolled back)
	 */
	commit(): Promise<CommitSummary>;

	/**
	 * Discard every pending registration without writing.
	 */
	clear(): void;
}
