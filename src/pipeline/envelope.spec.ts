import {
  decodeAttributes,
  decodeBatch,
  decodeResult,
  encodeAttributes,
  encodeBatch,
  encodeResult,
} from './envelope';
import { correlationKey } from './types';
import { MalformedBatchError } from '../common/errors';

describe('envelope', () => {
  describe('encodeBatch', () => {
    it('should write entries as [statement, resultKey] pairs', () => {
      const body = encodeBatch([
        { sql: 'INSERT INTO player (id) VALUES (42)', resultKey: 'affected' },
        { sql: 'SELECT * FROM player WHERE id IN (?)', resultKey: 'player', params: [42] },
      ]);

      expect(body).toBe(
        '{"queries":[["INSERT INTO player (id) VALUES (42)","affected"],["SELECT * FROM player WHERE id IN (?)","player",[42]]]}',
      );
    });
  });

  describe('decodeBatch', () => {
    it('should decode entries in order', () => {
      const batch = decodeBatch('{"queries":[["SELECT 1","a"],["SELECT ?","b",[2]]]}');

      expect(batch).toEqual([
        { sql: 'SELECT 1', resultKey: 'a' },
        { sql: 'SELECT ?', resultKey: 'b', params: [2] },
      ]);
    });

    it('should accept an empty batch', () => {
      expect(decodeBatch('{"queries":[]}')).toEqual([]);
    });

    it('should reject invalid JSON', () => {
      expect(() => decodeBatch('{queries')).toThrow(MalformedBatchError);
      expect(() => decodeBatch('{queries')).toThrow('Message body is not valid JSON');
    });

    it('should reject a body that is not an object', () => {
      expect(() => decodeBatch('[1,2]')).toThrow('Message body must be a JSON object');
    });

    it('should reject a missing queries list', () => {
      expect(() => decodeBatch('{"statements":[]}')).toThrow(/^Invalid batch: queries/);
    });

    it('should reject entries that are not statement pairs', () => {
      expect(() => decodeBatch('{"queries":[["SELECT 1"]]}')).toThrow(MalformedBatchError);
      expect(() => decodeBatch('{"queries":[[1,"a"]]}')).toThrow(MalformedBatchError);
      expect(() => decodeBatch('{"queries":[["SELECT ?","a",[{"x":1}]]]}')).toThrow(MalformedBatchError);
    });
  });

  describe('attributes', () => {
    it('should encode correlation attributes as strings', () => {
      expect(encodeAttributes({
        serverId: 'srvA',
        transactionId: 't-1',
        insertionTime: 1700000000.5,
        batch: [],
      })).toEqual({ srv_id: 'srvA', trans_id: 't-1', insertion_time: '1700000000.5' });
    });

    it('should decode valid attributes', () => {
      expect(decodeAttributes({ srv_id: 'srvA', trans_id: 't-1', insertion_time: '1700000000.5' }))
        .toEqual({ srv_id: 'srvA', trans_id: 't-1', insertion_time: '1700000000.5' });
    });

    it('should allow a missing insertion time', () => {
      expect(decodeAttributes({ srv_id: 'srvA', trans_id: 't-1' })).toEqual({ srv_id: 'srvA', trans_id: 't-1' });
    });

    it('should reject missing correlation attributes', () => {
      expect(() => decodeAttributes({ srv_id: 'srvA' })).toThrow('Invalid message attributes: trans_id');
    });

    it('should reject a non-numeric insertion time', () => {
      expect(() => decodeAttributes({ srv_id: 'srvA', trans_id: 't', insertion_time: 'yesterday' }))
        .toThrow(MalformedBatchError);
    });
  });

  describe('results', () => {
    it('should flatten rows next to affected and timers', () => {
      const raw = encodeResult({
        rows: { player: [{ id: 42, slots: 50 }] },
        affected: 1,
        timers: { commit: 0.01 },
      });

      expect(JSON.parse(raw)).toEqual({
        player: [{ id: 42, slots: 50 }],
        affected: 1,
        timers: { commit: 0.01 },
      });
    });

    it('should decode a stored result', () => {
      const result = decodeResult('{"player":[{"id":42}],"cardlist":[],"affected":3,"timers":{"commit":0.5,"bad":"x"}}');

      expect(result).toEqual({
        rows: { player: [{ id: 42 }], cardlist: [] },
        affected: 3,
        timers: { commit: 0.5 },
      });
    });

    it('should reject results without an affected count', () => {
      expect(() => decodeResult('{"player":[]}')).toThrow('Stored result is missing a numeric "affected" count');
    });

    it('should reject row entries that are not lists', () => {
      expect(() => decodeResult('{"player":{"id":1},"affected":0}')).toThrow("Stored result key 'player' is not a row list");
    });
  });

  describe('correlationKey', () => {
    it('should join server and transaction ids', () => {
      expect(correlationKey('srvA', 't-1')).toBe('srvA:t-1');
    });
  });
});
