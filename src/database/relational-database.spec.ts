import type { Connection } from 'mysql2/promise';
import { MysqlDatabase, classifyDatabaseError } from './relational-database';
import { IntegrityViolationError } from '../common/errors';

function sqlError(message: string, sqlState: string): Error {
  return Object.assign(new Error(message), { sqlState, code: 'ER_TEST' });
}

describe('MysqlDatabase', () => {
  let connection: {
    beginTransaction: jest.Mock;
    query: jest.Mock;
    commit: jest.Mock;
    rollback: jest.Mock;
    end: jest.Mock;
  };
  let database: MysqlDatabase;

  beforeEach(() => {
    connection = {
      beginTransaction: jest.fn().mockResolvedValue(undefined),
      query: jest.fn(),
      commit: jest.fn().mockResolvedValue(undefined),
      rollback: jest.fn().mockResolvedValue(undefined),
      end: jest.fn().mockResolvedValue(undefined),
    };
    database = new MysqlDatabase(connection as unknown as Connection);
  });

  it('should return selected rows with a zero row count', async () => {
    connection.query.mockResolvedValue([[{ id: 42, slots: 50 }], []]);

    const outcome = await database.execute('SELECT * FROM player WHERE id IN (?)', [42]);

    expect(connection.query).toHaveBeenCalledWith('SELECT * FROM player WHERE id IN (?)', [42]);
    expect(outcome).toEqual({ rows: [{ id: 42, slots: 50 }], rowCount: 0 });
  });

  it('should pass BIGINT UNSIGNED values through as exact decimal strings', async () => {
    connection.query.mockResolvedValue([[{ id: 1, points: '18446744073709551615' }], []]);

    const outcome = await database.execute('SELECT * FROM ledger WHERE id IN (?)', [1]);

    expect(outcome.rows).toEqual([{ id: 1, points: '18446744073709551615' }]);
  });

  it('should report affected rows for writes', async () => {
    connection.query.mockResolvedValue([{ affectedRows: 3, insertId: 0 }, undefined]);

    const outcome = await database.execute('UPDATE card SET ownerid=0 WHERE ownerid=7');

    expect(connection.query).toHaveBeenCalledWith('UPDATE card SET ownerid=0 WHERE ownerid=7', []);
    expect(outcome).toEqual({ rows: [], rowCount: 3 });
  });

  it('should raise integrity violations as IntegrityViolationError', async () => {
    connection.query.mockRejectedValue(sqlError("Duplicate entry '42' for key 'PRIMARY'", '23000'));

    const error = await database.execute('INSERT INTO player (id) VALUES (42)').catch(e => e);

    expect(error).toBeInstanceOf(IntegrityViolationError);
    expect(error.sqlState).toBe('23000');
    expect(error.message).toBe("Duplicate entry '42' for key 'PRIMARY'");
  });

  it('should rethrow other driver errors unchanged', async () => {
    const syntax = sqlError('You have an error in your SQL syntax', '42000');
    connection.query.mockRejectedValue(syntax);

    await expect(database.execute('SELEC 1')).rejects.toBe(syntax);
  });

  it('should delegate transaction control to the connection', async () => {
    await database.begin();
    await database.commit();
    await database.rollback();
    await database.close();

    expect(connection.beginTransaction).toHaveBeenCalled();
    expect(connection.commit).toHaveBeenCalled();
    expect(connection.rollback).toHaveBeenCalled();
    expect(connection.end).toHaveBeenCalled();
  });
});

describe('classifyDatabaseError', () => {
  it('should leave non-driver errors alone', () => {
    const error = new Error('socket hang up');
    expect(classifyDatabaseError(error)).toBe(error);
    expect(classifyDatabaseError('text')).toBe('text');
  });
});
