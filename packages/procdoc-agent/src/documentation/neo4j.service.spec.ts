const mockDriverFactory = jest.fn();

jest.mock('neo4j-driver', () => ({
  __esModule: true,
  default: {
    driver: (...args: unknown[]) => mockDriverFactory(...args),
    auth: {
      basic: (principal: string, credentials: string) => ({
        scheme: 'basic',
        principal,
        credentials,
      }),
    },
    session: { READ: 'READ', WRITE: 'WRITE' },
  },
}));

import { GraphUnavailableError } from '../common/procdoc.errors';
import { Neo4jService } from './neo4j.service';

function createFakeDriver() {
  const run = jest.fn().mockResolvedValue({
    records: [{ toObject: () => ({ id: 'a', description: 'Open' }) }],
  });
  const transaction = { run };
  const session = {
    executeRead: jest.fn(
      async (work: (tx: typeof transaction) => Promise<unknown>) =>
        work(transaction),
    ),
    executeWrite: jest.fn(
      async (work: (tx: typeof transaction) => Promise<unknown>) =>
        work(transaction),
    ),
    run: jest.fn().mockResolvedValue({ records: [] }),
    close: jest.fn().mockResolvedValue(undefined),
  };
  const driver = {
    verifyConnectivity: jest.fn().mockResolvedValue({}),
    session: jest.fn().mockReturnValue(session),
    close: jest.fn().mockResolvedValue(undefined),
  };
  return { driver, session, run };
}

const connection = {
  uri: 'bolt://graph.test:7687',
  user: 'reader',
  password: 'test-secret',
  database: 'processes',
};
const timeouts = { connectionTimeoutMs: 1000, queryTimeoutMs: 2000 };

describe('Neo4jService', () => {
  const service = new Neo4jService();

  beforeEach(() => {
    mockDriverFactory.mockReset();
  });

  it('opens a driver and verifies connectivity', async () => {
    const fake = createFakeDriver();
    mockDriverFactory.mockReturnValue(fake.driver);

    await service.connect(connection, timeouts);

    expect(mockDriverFactory).toHaveBeenCalledWith(
      'bolt://graph.test:7687',
      { scheme: 'basic', principal: 'reader', credentials: 'test-secret' },
      {
        disableLosslessIntegers: true,
        connectionTimeout: 1000,
        connectionAcquisitionTimeout: 1000,
      },
    );
    expect(fake.driver.verifyConnectivity).toHaveBeenCalledWith({
      database: 'processes',
    });
  });

  it('closes the driver when the database cannot be reached', async () => {
    const fake = createFakeDriver();
    fake.driver.verifyConnectivity.mockRejectedValue(new Error('refused'));
    mockDriverFactory.mockReturnValue(fake.driver);

    await expect(service.connect(connection, timeouts)).rejects.toThrow(
      new GraphUnavailableError(
        'Cannot reach process graph at bolt://graph.test:7687: refused',
      ),
    );
    expect(fake.driver.close).toHaveBeenCalledTimes(1);
  });

  it('wraps driver construction errors', async () => {
    mockDriverFactory.mockImplementation(() => {
      throw new Error('Unknown scheme: ftp');
    });

    await expect(
      service.connect({ ...connection, uri: 'ftp://graph.test' }, timeouts),
    ).rejects.toThrow(
      'Invalid graph connection ftp://graph.test: Unknown scheme: ftp',
    );
  });

  describe('graph client', () => {
    it('reads rows as plain objects inside a read transaction', async () => {
      const fake = createFakeDriver();
      mockDriverFactory.mockReturnValue(fake.driver);
      const client = await service.connect(connection, timeouts);

      const rows = await client.read('MATCH (s) RETURN s', { process: null });

      expect(rows).toEqual([{ id: 'a', description: 'Open' }]);
      expect(fake.driver.session).toHaveBeenCalledWith({
        database: 'processes',
        defaultAccessMode: 'READ',
      });
      expect(fake.run).toHaveBeenCalledWith('MATCH (s) RETURN s', {
        process: null,
      });
      expect(fake.session.executeRead).toHaveBeenCalledWith(
        expect.any(Function),
        { timeout: 2000 },
      );
      expect(fake.session.close).toHaveBeenCalledTimes(1);
    });

    it('turns query failures into GraphUnavailableError', async () => {
      const fake = createFakeDriver();
      fake.run.mockRejectedValue(new Error('timed out'));
      mockDriverFactory.mockReturnValue(fake.driver);
      const client = await service.connect(connection, timeouts);

      await expect(client.read('MATCH (s) RETURN s', {})).rejects.toThrow(
        new GraphUnavailableError('Process graph query failed: timed out'),
      );
      expect(fake.session.close).toHaveBeenCalledTimes(1);
    });

    it('runs every write statement in one transaction', async () => {
      const fake = createFakeDriver();
      mockDriverFactory.mockReturnValue(fake.driver);
      const client = await service.connect(connection, timeouts);

      await client.write([
        { query: 'CREATE (a)', params: { id: 'a' } },
        { query: 'CREATE (b)', params: { id: 'b' } },
      ]);

      expect(fake.session.executeWrite).toHaveBeenCalledTimes(1);
      expect(fake.run.mock.calls).toEqual([
        ['CREATE (a)', { id: 'a' }],
        ['CREATE (b)', { id: 'b' }],
      ]);
    });

    it('keeps closing quiet when the driver fails to close', async () => {
      const fake = createFakeDriver();
      fake.driver.close.mockRejectedValue(new Error('already closed'));
      mockDriverFactory.mockReturnValue(fake.driver);
      const client = await service.connect(connection, timeouts);

      await expect(client.close()).resolves.toBeUndefined();
    });
  });
});
