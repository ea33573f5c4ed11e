/**
 * Ordered sets of pending entities, one per kind, keyed by entity identity.
 *
 * Adding an identity that is already present replaces the stored instance but
 * keeps its original position. Kinds are listed in the order they were first
 * added to.
 */

import type { EntityId, KindOf } from '@inkpost/domain-core';

export class PendingSet<TKinds> {
	private buckets: { [K in keyof TKinds]?: Map<EntityId, TKinds[K]> } = {};
	private order: KindOf<TKinds>[] = [];

	add<K extends KindOf<TKinds>>(kind: K, id: EntityId, entity: TKinds[K]): void {
		const existing = this.peek(kind);
		if (existing) {
			existing.set(id, entity);
			return;
		}

		const created = new Map<EntityId, TKinds[K]>([[id, entity]]);
		this.buckets[kind] = created;
		this.order.push(kind);
	}

	has<K extends KindOf<TKinds>>(kind: K, id: EntityId): boolean {
		return this.peek(kind)?.has(id) ?? false;
	}

	delete<K extends KindOf<TKinds>>(kind: K, id: EntityId): boolean {
		return this.peek(kind)?.delete(id) ?? false;
	}

	entries<K extends KindOf<TKinds>>(kind: K): TKinds[K][] {
		return [...(this.peek(kind)?.values() ?? [])];
	}

	/**
	 * Kinds with at least one pending entity, in first-added order.
	 */
	kinds(): KindOf<TKinds>[] {
		return this.order.filter((kind) => (this.peek(kind)?.size ?? 0) > 0);
	}

	get size(): number {
		return this.order.reduce((total, kind) => total + (this.peek(kind)?.size ?? 0), 0);
	}

	clear(): void {
		this.buckets = {};
		this.order = [];
	}

	private peek<K extends KindOf<TKinds>>(kind: K): Map<EntityId, TKinds[K]> | undefined {
		return this.buckets[kind];
	}
}
