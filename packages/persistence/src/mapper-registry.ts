/**
 * Mapper Registry
 *
 * Central dispatcher from entity kinds to the mappers that persist them.
 * The unit of work resolves a mapper here for every kind it has pending.
 */

import type { KindOf } from '@inkpost/domain-core';
import { MapperNotFoundError } from './errors.js';
import type { TransactionContext } from './transaction.js';

/**
 * Batched persistence operations for one entity type.
 *
 * Each method issues a single statement for the whole batch and must be a
 * no-op for an empty batch.
 */
export interface Mapper<T> {
	/**
	 * Insert new entities.
	 */
	addAll(entities: readonly T[], tx?: TransactionContext): Promise<void>;

	/**
	 * Update changed entities, keyed on their identity column.
	 */
	updateAll(entities: readonly T[], tx?: TransactionContext): Promise<void>;

	/**
	 * Delete removed entities.
	 */
	deleteAll(entities: readonly T[], tx?: TransactionContext): Promise<void>;
}

/**
 * Mappers registered so far, one optional slot per kind.
 */
type MapperSlots<TKinds> = {
	[K in keyof TKinds]?: Mapper<TKinds[K]>;
};

/**
 * Registry of mappers keyed by entity kind.
 */
export interface MapperRegistry<TKinds> {
	/**
	 * Register the mapper for a kind. A later registration for the same kind
	 * replaces the earlier one.
	 */
	register<K extends KindOf<TKinds>>(kind: K, mapper: Mapper<TKinds[K]>): void;

	/**
	 * Get the mapper for a kind.
	 *
	 * @throws MapperNotFoundError if no mapper is registered for the kind
	 */
	get<K extends KindOf<TKinds>>(kind: K): Mapper<TKinds[K]>;

	/**
	 * Check whether a kind has a mapper.
	 */
	has(kind: KindOf<TKinds>): boolean;

	/**
	 * Registered kinds, in registration order.
	 */
	kinds(): readonly KindOf<TKinds>[];
}

/**
 * Create an empty mapper registry.
 *
 * @example
 * ```typescript
 * const registry = createMapperRegistry<InboxEntities>();
 * registry.register('user', createUserMapper(db));
 * registry.register('message', createMessageMapper(db));
 * ```
 */
export function createMapperRegistry<TKinds>(): MapperRegistry<TKinds> {
	const mappers: MapperSlots<TKinds> = {};
	const registered: KindOf<TKinds>[] = [];

	return {
		register<K extends KindOf<TKinds>>(kind: K, mapper: Mapper<TKinds[K]>): void {
			if (!registered.includes(kind)) {
				registered.push(kind);
			}
			mappers[kind] = mapper;
		},

		get<K extends KindOf<TKinds>>(kind: K): Mapper<TKinds[K]> {
			const mapper: Mapper<TKinds[K]> | undefined = mappers[kind];

			if (!mapper) {
				throw new MapperNotFoundError(kind, registered);
			}

			return mapper;
		},

		has(kind: KindOf<TKinds>): boolean {
			return registered.includes(kind);
		},

		kinds(): readonly KindOf<TKinds>[] {
			return [...registered];
		},
	};
}
