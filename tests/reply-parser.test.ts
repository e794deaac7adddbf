import * as assert from 'assert';
import { parseReply, readAnswer, readSql, stripCodeFence } from '../src/services/reply-parser.js';
import { ReplyParseError } from '../src/types/errors.js';

describe('reply-parser', () => {
  describe('stripCodeFence', () => {
    it('should remove a json fence', () => {
      assert.strictEqual(stripCodeFence('```json\n{"SQL": "SELECT 1"}\n```'), '{"SQL": "SELECT 1"}');
    });

    it('should remove an unlabelled fence', () => {
      assert.strictEqual(stripCodeFence('```\n{"Answer": 3}\n```'), '{"Answer": 3}');
    });

    it('should leave plain text untouched apart from outer whitespace', () => {
      assert.strictEqual(stripCodeFence('  {"Answer": "hi"}\n'), '{"Answer": "hi"}');
    });
  });

  describe('parseReply', () => {
    it('should parse a bare JSON object', () => {
      assert.deepStrictEqual(parseReply('{"SQL": "SELECT 1", "Reasoning": "simple"}'), {
        SQL: 'SELECT 1',
        Reasoning: 'simple',
      });
    });

    it('should parse a fenced reply with an uppercase label', () => {
      assert.deepStrictEqual(parseReply('```JSON\n{"Answer": "Five"}\n```'), { Answer: 'Five' });
    });

    it('should reject text that is not JSON and keep the raw reply', () => {
      assert.throws(
        () => parseReply('Sure! Here is your query.'),
        (error: unknown) =>
          error instanceof ReplyParseError && error.content === 'Sure! Here is your query.'
      );
    });

    it('should reject JSON that is not an object', () => {
      assert.throws(() => parseReply('[1, 2]'), ReplyParseError);
      assert.throws(() => parseReply('"SELECT 1"'), ReplyParseError);
      assert.throws(() => parseReply('null'), ReplyParseError);
    });
  });

  describe('readSql', () => {
    it('should return a SQL string as given', () => {
      assert.strictEqual(readSql({ SQL: 'SELECT 1' }), 'SELECT 1');
      assert.strictEqual(readSql({ SQL: '   ' }), '   ');
    });

    it('should return undefined without a SQL key', () => {
      assert.strictEqual(readSql({ Answer: 'hi' }), undefined);
    });

    it('should turn non-string values into their JSON text', () => {
      assert.strictEqual(readSql({ SQL: null }), 'null');
      assert.strictEqual(readSql({ SQL: 42 }), '42');
      assert.strictEqual(readSql({ SQL: ['SELECT 1'] }), '["SELECT 1"]');
    });
  });

  describe('readAnswer', () => {
    it('should return the answer of any JSON type', () => {
      assert.strictEqual(readAnswer({ Answer: 'There are 5 users.' }), 'There are 5 users.');
      assert.deepStrictEqual(readAnswer({ Answer: [1, 2] }), [1, 2]);
      assert.strictEqual(readAnswer({ Answer: null }), null);
    });

    it('should return undefined without an answer key', () => {
      assert.strictEqual(readAnswer({ SQL: 'SELECT 1' }), undefined);
    });
  });
});
