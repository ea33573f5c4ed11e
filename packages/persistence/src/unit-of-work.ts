/**
 * Drizzle Transactional Unit of Work
 *
 * Concrete implementation of UnitOfWork that collects new, dirty and removed
 * entities and writes them through their mappers inside a single drizzle
 * transaction.
 *
 * Commit order:
 * 1. Resolve the mapper of every pending kind (fails before any write)
 * 2. Insert new entities, kinds in flush order
 * 3. Update dirty entities, kinds in flush order
 * 4. Delete removed entities, kinds in reverse flush order
 *
 * Any failure rolls the whole transaction back and leaves the registrations
 * pending. Registrations made while a commit is running are kept for the
 * next one.
 */

import type {
	CommitSummary,
	EntityId,
	IdentityTable,
	KindOf,
	PendingCounts,
	UnitOfWork,
} from '@inkpost/domain-core';
import { createChildLogger, getLogger, type CommitContext, type Logger } from '@inkpost/logging';
import type { Mapper, MapperRegistry } from './mapper-registry.js';
import { PendingSet } from './pending-set.js';
import type { TransactionContext, TransactionManager } from './transaction.js';

/**
 * Configuration for the Drizzle Unit of Work.
 */
export interface DrizzleUnitOfWorkConfig<TKinds> {
	/** Transaction manager for database operations */
	readonly transactionManager: TransactionManager;
	/** Registry for dispatching pending entities to their mappers */
	readonly mapperRegistry: MapperRegistry<TKinds>;
	/** Identity accessor for every entity kind */
	readonly identify: IdentityTable<TKinds>;
	/**
	 * Parent-first kind order. Inserts and updates follow it, deletes run in
	 * reverse. Kinds not listed are flushed afterwards, in the order they were
	 * first registered.
	 */
	readonly flushOrder?: readonly KindOf<TKinds>[];
	/** Logger (default: the package default logger) */
	readonly logger?: Logger;
}

type WriteOperation = CommitContext['operation'];

interface PendingSets<TKinds> {
	readonly inserts: PendingSet<TKinds>;
	readonly updates: PendingSet<TKinds>;
	readonly removals: PendingSet<TKinds>;
}

interface CommitStep {
	readonly kind: string;
	readonly operation: WriteOperation;
	readonly count: number;
	run(tx: TransactionContext): Promise<void>;
}

/**
 * Create a Drizzle-based Unit of Work.
 *
 * @example
 * ```typescript
 * const unitOfWork = createUnitOfWork<InboxEntities>({
 *     transactionManager: createTransactionManager(db),
 *     mapperRegistry: registry,
 *     identify: { user: (user) => user.userId, message: (message) => message.messageId },
 *     flushOrder: ['user', 'message'],
 * });
 *
 * unitOfWork.registerDirty('user', user);
 * await unitOfWork.commit();
 * ```
 */
export function createUnitOfWork<TKinds>(config: DrizzleUnitOfWorkConfig<TKinds>): UnitOfWork<TKinds> {
	const { transactionManager, mapperRegistry, identify, flushOrder = [] } = config;
	const logger = createChildLogger(config.logger ?? getLogger(), { component: 'unit-of-work' });

	// Replaced wholesale when a commit takes them over
	let inserts = new PendingSet<TKinds>();
	let updates = new PendingSet<TKinds>();
	let removals = new PendingSet<TKinds>();

	const identityOf = <K extends KindOf<TKinds>>(kind: K, entity: TKinds[K]): EntityId => identify[kind](entity);

	const ordered = (kinds: KindOf<TKinds>[]): KindOf<TKinds>[] => {
		const rank = (kind: KindOf<TKinds>): number => {
			const index = flushOrder.indexOf(kind);
			return index === -1 ? flushOrder.length : index;
		};
		return [...kinds].sort((a, b) => rank(a) - rank(b));
	};

	const plan = (set: PendingSet<TKinds>, operation: WriteOperation, kinds: KindOf<TKinds>[]): CommitStep[] =>
		kinds.map((kind) => {
			const mapper = mapperRegistry.get(kind);
			const entities = set.entries(kind);
			return {
				kind,
				operation,
				count: entities.length,
				run: (tx: TransactionContext) => write(mapper, operation, entities, tx),
			};
		});

	const registerNew = <K extends KindOf<TKinds>>(kind: K, entity: TKinds[K]): void => {
		const id = identityOf(kind, entity);

		if (removals.delete(kind, id)) {
			// The row still exists: overwrite it instead of inserting a duplicate
			updates.add(kind, id, entity);
			return;
		}
		inserts.add(kind, id, entity);
	};

	const registerDirty = <K extends KindOf<TKinds>>(kind: K, entity: TKinds[K]): void => {
		const id = identityOf(kind, entity);

		if (removals.has(kind, id)) {
			return;
		}
		if (inserts.has(kind, id)) {
			inserts.add(kind, id, entity);
			return;
		}
		updates.add(kind, id, entity);
	};

	const registerRemoved = <K extends KindOf<TKinds>>(kind: K, entity: TKinds[K]): void => {
		const id = identityOf(kind, entity);

		updates.delete(kind, id);
		if (inserts.delete(kind, id)) {
			// Never written, nothing to delete
			return;
		}
		removals.add(kind, id, entity);
	};

	/**
	 * Hand the pending sets to a commit and start collecting into empty ones.
	 */
	const takePending = (): PendingSets<TKinds> => {
		const taken = { inserts, updates, removals };
		inserts = new PendingSet<TKinds>();
		updates = new PendingSet<TKinds>();
		removals = new PendingSet<TKinds>();
		return taken;
	};

	/**
	 * Put back the sets of a failed commit, then re-apply whatever was
	 * registered while it ran so later registrations still win.
	 */
	const restorePending = (taken: PendingSets<TKinds>): void => {
		const arrived = { inserts, updates, removals };
		({ inserts, updates, removals } = taken);

		for (const kind of arrived.inserts.kinds()) {
			for (const entity of arrived.inserts.entries(kind)) registerNew(kind, entity);
		}
		for (const kind of arrived.updates.kinds()) {
			for (const entity of arrived.updates.entries(kind)) registerDirty(kind, entity);
		}
		for (const kind of arrived.removals.kinds()) {
			for (const entity of arrived.removals.entries(kind)) registerRemoved(kind, entity);
		}
	};

	return {
		registerNew,

		registerDirty,

		registerRemoved,

		hasChanges(): boolean {
			return inserts.size + updates.size + removals.size > 0;
		},

		pending(): PendingCounts {
			return { new: inserts.size, dirty: updates.size, removed: removals.size };
		},

		async commit(): Promise<CommitSummary> {
			const steps = [
				...plan(inserts, 'insert', ordered(inserts.kinds())),
				...plan(updates, 'update', ordered(updates.kinds())),
				...plan(removals, 'delete', ordered(removals.kinds()).reverse()),
			];

			const summary: CommitSummary = {
				inserted: countFor(steps, 'insert'),
				updated: countFor(steps, 'update'),
				deleted: countFor(steps, 'delete'),
			};

			if (steps.length === 0) {
				logger.debug('Nothing to commit');
				return summary;
			}

			// Registrations made while the transaction runs stay pending for the next commit
			const taken = takePending();

			try {
				await transactionManager.inTransaction(async (tx) => {
					for (const step of steps) {
						const context: CommitContext = { kind: step.kind, operation: step.operation, count: step.count };
						logger.debug(context, 'Flushing pending entities');
						await step.run(tx);
					}
				});
			} catch (error) {
				restorePending(taken);
				logger.error({ err: error }, 'Commit failed, transaction rolled back');
				throw error;
			}

			logger.info(summary, 'Unit of work committed');
			return summary;
		},

		clear(): void {
			inserts.clear();
			updates.clear();
			removals.clear();
		},
	};
}

function write<T>(
	mapper: Mapper<T>,
	operation: WriteOperation,
	entities: readonly T[],
	tx: TransactionContext,
): Promise<void> {
	switch (operation) {
		case 'insert':
			return mapper.addAll(entities, tx);
		case 'update':
			return mapper.updateAll(entities, tx);
		case 'delete':
			return mapper.deleteAll(entities, tx);
	}
}

function countFor(steps: readonly CommitStep[], operation: WriteOperation): number {
	return steps.filter((step) => step.operation === operation).reduce((total, step) => total + step.count, 0);
}
