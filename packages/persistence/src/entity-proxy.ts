/**
 * Change-tracking proxy base.
 *
 * A proxy owns one entity and a reference to the unit of work tracking it.
 * Subclasses never see the entity directly: accessors go through `read`,
 * and mutations through `mutate`, which registers the entity dirty before
 * running the change. A mutating method that skips registration cannot be
 * written. Children added to an aggregate go through `attach`.
 *
 * @example
 * ```typescript
 * class MessageProxy extends EntityProxy<InboxEntities, 'message'> {
 *     constructor(message: Message, unitOfWork: UnitOfWork<InboxEntities>) {
 *         super('message', message, unitOfWork);
 *     }
 *
 *     get body(): string {
 *         return this.read((message) => message.body);
 *     }
 *
 *     edit(body: string): void {
 *         this.mutate((message) => message.edit(body));
 *     }
 * }
 * ```
 */

import type { KindOf, UnitOfWork } from '@inkpost/domain-core';

export abstract class EntityProxy<TKinds, K extends KindOf<TKinds>> {
	private readonly entity: TKinds[K];

	protected constructor(
		private readonly kind: K,
		entity: TKinds[K],
		protected readonly unitOfWork: UnitOfWork<TKinds>,
	) {
		this.entity = entity;
	}

	protected read<R>(fn: (entity: TKinds[K]) => R): R {
		return fn(this.entity);
	}

	protected mutate<R>(fn: (entity: TKinds[K]) => R): R {
		this.unitOfWork.registerDirty(this.kind, this.entity);
		return fn(this.entity);
	}

	/**
	 * Apply a change that adds a child entity to this one, then register the
	 * child as new. The owner itself is not marked dirty: its row is
	 * unchanged. A change that throws leaves nothing registered.
	 */
	protected attach<J extends KindOf<TKinds>, R>(kind: J, child: TKinds[J], fn: (entity: TKinds[K]) => R): R {
		const result = fn(this.entity);
		this.unitOfWork.registerNew(kind, child);
		return result;
	}

	protected markRemoved(): void {
		this.unitOfWork.registerRemoved(this.kind, this.entity);
	}
}
