import { describe, it, expect } from 'vitest';
import { createMapperRegistry } from '../mapper-registry.js';
import { MapperNotFoundError } from '../errors.js';
import { FakeStore, type Note, type Tag, type TestKinds } from './fakes.js';

describe('MapperRegistry', () => {
	const store = new FakeStore();
	const noteMapper = store.mapper<Note>('note', (note) => note.text);
	const tagMapper = store.mapper<Tag>('tag', (tag) => tag.label);

	it('should register and resolve mappers by kind', () => {
		const registry = createMapperRegistry<TestKinds>();

		registry.register('note', noteMapper);
		registry.register('tag', tagMapper);

		expect(registry.get('note')).toBe(noteMapper);
		expect(registry.get('tag')).toBe(tagMapper);
		expect(registry.kinds()).toEqual(['note', 'tag']);
	});

	it('should keep the last registration for a kind', () => {
		const registry = createMapperRegistry<TestKinds>();
		const replacement = store.mapper<Note>('note', (note) => note.text.toUpperCase());

		registry.register('note', noteMapper);
		registry.register('note', replacement);

		expect(registry.get('note')).toBe(replacement);
		expect(registry.kinds()).toEqual(['note']);
	});

	it('should throw MapperNotFoundError for an unregistered kind', () => {
		const registry = createMapperRegistry<TestKinds>();
		registry.register('note', noteMapper);

		expect(() => registry.get('tag')).toThrow(MapperNotFoundError);
		expect(() => registry.get('tag')).toThrow('No mapper registered for entity kind: tag. Registered kinds: note');
	});

	it('should report the kind on the error', () => {
		const registry = createMapperRegistry<TestKinds>();

		try {
			registry.get('note');
			expect.unreachable('expected MapperNotFoundError');
		} catch (error) {
			expect(error).toBeInstanceOf(MapperNotFoundError);
			if (error instanceof MapperNotFoundError) {
				expect(error.kind).toBe('note');
				expect(error.code).toBe('MAPPER_NOT_FOUND');
				expect(error.message).toBe('No mapper registered for entity kind: note. Registered kinds: (none)');
			}
		}
	});

	it('should answer has() per kind', () => {
		const registry = createMapperRegistry<TestKinds>();
		registry.register('tag', tagMapper);

		expect(registry.has('tag')).toBe(true);
		expect(registry.has('note')).toBe(false);
	});
});
