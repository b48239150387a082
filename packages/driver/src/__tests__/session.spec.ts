import { ROOT_CONTEXT, createContextKey } from '@opentelemetry/api';
import { ConsoleLogger, LogLevel } from '@cqltrace/logger';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Cluster } from '../cluster';
import { DriverError, SessionClosedError } from '../errors';
import { MemoryTransport } from '../memory';
import {
  BatchType,
  type ObservedBatch,
  type ObservedConnect,
  type ObservedQuery,
} from '../types';

const silentLogger = new ConsoleLogger({}, LogLevel.Silent);
const requestKey = createContextKey('request-id');

describe('Session', () => {
  let transport: MemoryTransport;
  let connects: ObservedConnect[];
  let queries: ObservedQuery[];
  let batches: ObservedBatch[];
  let cluster: Cluster;

  beforeEach(() => {
    transport = new MemoryTransport({
      hosts: [
        { address: '10.0.0.1', port: 9042, version: '4.1.3', up: true },
        { address: '10.0.0.2', port: 9042, version: '4.1.3', up: true },
      ],
    });
    connects = [];
    queries = [];
    batches = [];
    cluster = new Cluster({
      hosts: ['10.0.0.1', '10.0.0.2'],
      keyspace: 'shop',
      logger: silentLogger,
      transport: () => transport,
      connectObserver: { observeConnect: (o) => connects.push(o) },
      queryObserver: { observeQuery: (o) => queries.push(o) },
      batchObserver: { observeBatch: (o) => batches.push(o) },
    });
  });

  describe('createSession', () => {
    it('should report one connect per known host', async () => {
      const session = await cluster.createSession();

      expect(transport.isConnected).toBe(true);
      expect(connects).toHaveLength(2);
      expect(connects.map((c) => c.host.address)).toEqual([
        '10.0.0.1',
        '10.0.0.2',
      ]);
      expect(connects[0]?.error).toBeUndefined();
      expect(session.keyspace).toBe('shop');
    });

    it('should report failed connects per contact point and rethrow the same error', async () => {
      const failure = new Error('All host(s) tried for query failed');
      transport.failConnect(failure);

      await expect(cluster.createSession()).rejects.toBe(failure);

      expect(connects).toHaveLength(2);
      expect(connects[0]).toMatchObject({
        host: { address: '10.0.0.1', port: 9042 },
        error: failure,
      });
      expect(connects[1]?.host.address).toBe('10.0.0.2');
    });

    it('should shut the transport down when connecting fails', async () => {
      transport.failConnect(new Error('All host(s) tried for query failed'));

      await expect(cluster.createSession()).rejects.toThrow(
        'All host(s) tried for query failed',
      );

      expect(transport.shutdowns).toBe(1);
    });

    it('should keep the connect error when shutting down fails too', async () => {
      const failure = new Error('All host(s) tried for query failed');
      transport.failConnect(failure);
      vi.spyOn(transport, 'shutdown').mockRejectedValue(new Error('socket closed'));

      await expect(cluster.createSession()).rejects.toBe(failure);
    });

    it('should report a connect when a host comes back up', async () => {
      await cluster.createSession();
      connects.length = 0;

      transport.markDown('10.0.0.2');
      transport.markUp('10.0.0.2');

      expect(connects).toHaveLength(1);
      expect(connects[0]?.host).toEqual({
        address: '10.0.0.2',
        port: 9042,
        version: '4.1.3',
        up: true,
      });
    });

    it('should capture observers at creation time', async () => {
      const session = await cluster.createSession();
      const late = vi.fn();
      cluster.queryObserver = { observeQuery: late };

      await session.query('SELECT now() FROM system.local').exec();

      expect(late).not.toHaveBeenCalled();
      expect(queries).toHaveLength(1);
    });
  });

  describe('Query', () => {
    it('should report statement, values, host and context', async () => {
      const session = await cluster.createSession();
      const ctx = ROOT_CONTEXT.setValue(requestKey, 'req-1');

      await session
        .query('INSERT INTO users (id, name) VALUES (?, ?)', 1, 'Ada')
        .exec(ctx);

      expect(queries).toHaveLength(1);
      const [observed] = queries;
      expect(observed).toMatchObject({
        keyspace: 'shop',
        statement: 'INSERT INTO users (id, name) VALUES (?, ?)',
        values: [1, 'Ada'],
        host: { address: '10.0.0.1', port: 9042 },
        rows: 0,
      });
      expect(observed?.context.getValue(requestKey)).toBe('req-1');
      expect(observed?.error).toBeUndefined();
      expect(observed?.end.getTime()).toBeGreaterThanOrEqual(
        observed?.start.getTime() ?? 0,
      );
    });

    it('should use the active context when none is passed', async () => {
      const session = await cluster.createSession();

      await session.query('SELECT * FROM users').exec();

      expect(queries[0]?.context).toBe(ROOT_CONTEXT);
    });

    it('should reject with the driver error unchanged and report it', async () => {
      const failure = new Error('unconfigured table users');
      transport.fail(/FROM users/, failure);
      const session = await cluster.createSession();

      await expect(session.query('SELECT * FROM users').exec()).rejects.toBe(
        failure,
      );

      expect(queries).toHaveLength(1);
      expect(queries[0]?.error).toBe(failure);
      expect(queries[0]?.host).toBeUndefined();
    });

    it('should return the first row', async () => {
      transport.respond('SELECT * FROM users', [{ id: 1 }, { id: 2 }]);
      const session = await cluster.createSession();

      const row = await session.query('SELECT * FROM users').first();

      expect(row).toEqual({ id: 1 });
      expect(queries[0]?.rows).toBe(1);
    });

    it('should page through results, one observed query per page', async () => {
      transport.respond('SELECT * FROM users', [
        { id: 1 },
        { id: 2 },
        { id: 3 },
        { id: 4 },
        { id: 5 },
      ]);
      const session = await cluster.createSession();

      const ids: unknown[] = [];
      for await (const row of session.query('SELECT * FROM users').pageSize(2).iter()) {
        ids.push(row.id);
      }

      expect(ids).toEqual([1, 2, 3, 4, 5]);
      expect(queries.map((q) => q.rows)).toEqual([2, 2, 1]);
    });

    it('should reject page sizes that are not positive integers', async () => {
      const session = await cluster.createSession();
      const query = session.query('SELECT * FROM users');

      expect(() => query.pageSize(0)).toThrow(
        expect.objectContaining({ code: 'INVALID_PAGE_SIZE' }),
      );
      expect(() => query.pageSize(-1)).toThrow(
        'Page size must be a positive integer, got -1',
      );
      expect(() => query.pageSize(2.5)).toThrow(DriverError);
    });

    it('should fall back to the cluster page size', async () => {
      const rows = Array.from({ length: 3 }, (_, id) => ({ id }));
      transport.respond('SELECT * FROM users', rows);
      const session = await new Cluster({
        hosts: ['10.0.0.1'],
        pageSize: 2,
        logger: silentLogger,
        transport: () => transport,
      }).createSession();

      let count = 0;
      for await (const _row of session.query('SELECT * FROM users').iter()) {
        count++;
      }

      expect(count).toBe(3);
      expect(transport.executed).toHaveLength(2);
    });

    it('should report a query without host when no node is up', async () => {
      const session = await cluster.createSession();
      transport.markDown('10.0.0.1');
      transport.markDown('10.0.0.2');

      await expect(session.query('SELECT * FROM users').exec()).rejects.toThrow(
        'No available host',
      );

      expect(queries[0]?.host).toBeUndefined();
      expect(queries[0]?.error?.message).toContain('No available host');
    });
  });

  describe('Batch', () => {
    it('should report one event for the whole batch', async () => {
      const session = await cluster.createSession();
      const ctx = ROOT_CONTEXT.setValue(requestKey, 'req-2');

      const batch = session
        .batch(BatchType.Unlogged)
        .query('INSERT INTO users (id) VALUES (?)', 1)
        .query('INSERT INTO users (id) VALUES (?)', 2)
        .query('UPDATE counters SET n = n + 1 WHERE id = ?', 3);
      await session.executeBatch(batch, ctx);

      expect(batch.size).toBe(3);
      expect(batches).toHaveLength(1);
      expect(batches[0]?.statements).toEqual([
        'INSERT INTO users (id) VALUES (?)',
        'INSERT INTO users (id) VALUES (?)',
        'UPDATE counters SET n = n + 1 WHERE id = ?',
      ]);
      expect(batches[0]?.context.getValue(requestKey)).toBe('req-2');
      expect(transport.batches[0]?.type).toBe(BatchType.Unlogged);
    });

    it('should default to a logged batch', async () => {
      const session = await cluster.createSession();

      await session.batch().query('INSERT INTO users (id) VALUES (?)', 1).exec();

      expect(transport.batches[0]?.type).toBe(BatchType.Logged);
    });

    it('should reject with the driver error unchanged and report it', async () => {
      const failure = new Error('Batch too large');
      transport.fail(/^INSERT/, failure);
      const session = await cluster.createSession();

      await expect(
        session.batch().query('INSERT INTO users (id) VALUES (?)', 1).exec(),
      ).rejects.toBe(failure);

      expect(batches[0]?.error).toBe(failure);
    });
  });

  describe('observers', () => {
    it('should not let a throwing observer change the outcome', async () => {
      transport.respond('SELECT * FROM users', [{ id: 7 }]);
      const session = await new Cluster({
        hosts: ['10.0.0.1'],
        logger: silentLogger,
        transport: () => transport,
        queryObserver: {
          observeQuery: () => {
            throw new Error('observer bug');
          },
        },
      }).createSession();

      await expect(session.query('SELECT * FROM users').first()).resolves.toEqual({
        id: 7,
      });
    });
  });

  describe('close', () => {
    it('should shut the transport down once', async () => {
      const session = await cluster.createSession();

      await session.close();
      await session.close();

      expect(session.closed).toBe(true);
      expect(transport.shutdowns).toBe(1);
    });

    it('should reject operations on a closed session without observing them', async () => {
      const session = await cluster.createSession();
      await session.close();

      await expect(session.query('SELECT * FROM users').exec()).rejects.toBeInstanceOf(
        SessionClosedError,
      );
      await expect(session.batch().exec()).rejects.toMatchObject({
        code: 'SESSION_CLOSED',
      });
      expect(queries).toHaveLength(0);
      expect(batches).toHaveLength(0);
    });
  });
});
