export type MockType<T> = {
	[P in keyof T]: jest.Mock;
};

type RepositoryMethod =
	| 'find'
	| 'findOne'
	| 'findOneBy'
	| 'count'
	| 'create'
	| 'save'
	| 'insert'
	| 'update'
	| 'increment'
	| 'decrement'
	| 'delete';

export type RepositoryMock = Record<RepositoryMethod, jest.Mock>;

export const repositoryMockFactory = (): RepositoryMock => ({
	find: jest.fn(),
	findOne: jest.fn(),
	findOneBy: jest.fn(),
	count: jest.fn(),
	create: jest.fn((entity: unknown) => entity),
	save: jest.fn((entity: unknown) => Promise.resolve(entity)),
	insert: jest.fn(),
	update: jest.fn(),
	increment: jest.fn(),
	decrement: jest.fn(),
	delete: jest.fn(),
});

export const cacheManagerMockFactory = () => ({
	get: jest.fn().mockResolvedValue(undefined),
	set: jest.fn().mockResolvedValue(undefined),
	del: jest.fn().mockResolvedValue(undefined),
});
