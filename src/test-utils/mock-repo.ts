// eslint-disable-next-line @typescript-eslint/no-unused-vars
export type MockRepo<T> = {
  findOne: jest.Mock;
  find: jest.Mock;
  create: jest.Mock;
  save: jest.Mock;
  insert: jest.Mock;
  clear: jest.Mock;
  createQueryBuilder: jest.Mock;
};

export function createMockRepo<T>(): MockRepo<T> {
  return {
    findOne: jest.fn(),
    find: jest.fn(),
    create: jest.fn((data: unknown) => data),
    save: jest.fn(async (data: unknown) => data),
    insert: jest.fn(),
    clear: jest.fn(),
    createQueryBuilder: jest.fn(),
  };
}
