import { Injectable, Logger } from '@nestjs/common';
import neo4j, { Driver } from 'neo4j-driver';
import { GraphUnavailableError, describeError } from '../common/procdoc.errors';
import { GraphConnection } from './documentation.types';

export type GraphRow = Record<string, unknown>;

export interface GraphStatement {
  query: string;
  params: Record<string, unknown>;
}

/** The slice of the graph database the documentation module uses. */
export interface GraphClient {
  read(query: string, params: Record<string, unknown>): Promise<GraphRow[]>;
  /** Runs every statement in one write transaction. */
  write(statements: GraphStatement[]): Promise<void>;
  /** Schema changes cannot share a transaction with data writes. */
  runSchema(query: string): Promise<void>;
  close(): Promise<void>;
}

export interface GraphTimeouts {
  connectionTimeoutMs: number;
  queryTimeoutMs: number;
}

export class Neo4jGraphClient implements GraphClient {
  private readonly logger = new Logger(Neo4jGraphClient.name);

  constructor(
    private readonly driver: Driver,
    private readonly database: string | null,
    private readonly queryTimeoutMs: number,
  ) {}

  async read(
    query: string,
    params: Record<string, unknown>,
  ): Promise<GraphRow[]> {
    const session = this.driver.session({
      database: this.database ?? undefined,
      defaultAccessMode: neo4j.session.READ,
    });
    try {
      const records = await session.executeRead(
        async (tx) => (await tx.run(query, params)).records,
        { timeout: this.queryTimeoutMs },
      );
      return records.map((record) => record.toObject());
    } catch (error) {
      throw new GraphUnavailableError(
        `Process graph query failed: ${describeError(error)}`,
        { cause: error },
      );
    } finally {
      await session.close();
    }
  }

  async write(statements: GraphStatement[]): Promise<void> {
    const session = this.driver.session({
      database: this.database ?? undefined,
      defaultAccessMode: neo4j.session.WRITE,
    });
    try {
      await session.executeWrite(
        async (tx) => {
          for (const statement of statements) {
            await tx.run(statement.query, statement.params);
          }
        },
        { timeout: this.queryTimeoutMs },
      );
    } catch (error) {
      throw new GraphUnavailableError(
        `Process graph write failed: ${describeError(error)}`,
        { cause: error },
      );
    } finally {
      await session.close();
    }
  }

  async runSchema(query: string): Promise<void> {
    const session = this.driver.session({
      database: this.database ?? undefined,
      defaultAccessMode: neo4j.session.WRITE,
    });
    try {
      await session.run(query);
    } catch (error) {
      throw new GraphUnavailableError(
        `Process graph schema update failed: ${describeError(error)}`,
        { cause: error },
      );
    } finally {
      await session.close();
    }
  }

  async close(): Promise<void> {
    try {
      await this.driver.close();
    } catch (error) {
      this.logger.warn(
        `Failed to close the graph connection: ${describeError(error)}`,
      );
    }
  }
}

@Injectable()
export class Neo4jService {
  private readonly logger = new Logger(Neo4jService.name);

  /**
   * Opens a driver and verifies it can reach the database. The password is
   * never logged.
   */
  async connect(
    connection: GraphConnection,
    timeouts: GraphTimeouts,
  ): Promise<GraphClient> {
    let driver: Driver;
    try {
      driver = neo4j.driver(
        connection.uri,
        neo4j.auth.basic(connection.user, connection.password),
        {
          disableLosslessIntegers: true,
          connectionTimeout: timeouts.connectionTimeoutMs,
          connectionAcquisitionTimeout: timeouts.connectionTimeoutMs,
        },
      );
    } catch (error) {
      throw new GraphUnavailableError(
        `Invalid graph connection ${connection.uri}: ${describeError(error)}`,
        { cause: error },
      );
    }

    try {
      await driver.verifyConnectivity({
        database: connection.database ?? undefined,
      });
    } catch (error) {
      await driver.close();
      throw new GraphUnavailableError(
        `Cannot reach process graph at ${connection.uri}: ${describeError(error)}`,
        { cause: error },
      );
    }

    this.logger.log(
      `Connected to process graph at ${connection.uri} as ${connection.user}`,
    );
    return new Neo4jGraphClient(
      driver,
      connection.database,
      timeouts.queryTimeoutMs,
    );
  }
}
