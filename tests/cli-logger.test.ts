import * as assert from 'assert';
import * as sinon from 'sinon';
import { field, sqlBlock } from '../src/cli/logger.js';

const ANSI = new RegExp(String.fromCharCode(27) + '\\[[0-9;]*m', 'g');

/**
 * Run `print` with console.log stubbed and return the lines without colors.
 */
function capture(print: () => void): string[] {
  const log = sinon.stub(console, 'log');
  try {
    print();
  } finally {
    log.restore();
  }
  return log.getCalls().map((call) => String(call.args[0]).replace(ANSI, ''));
}

describe('cli logger', () => {
  it('should number every line of a SQL block', () => {
    const lines = capture(() => sqlBlock('SELECT name\nFROM users\nWHERE id = 1'));

    assert.deepStrictEqual(lines, ['  1 SELECT name', '  2 FROM users', '  3 WHERE id = 1']);
  });

  it('should pad line numbers to the widest one', () => {
    const lines = capture(() => sqlBlock(Array.from({ length: 10 }, (_, i) => `-- ${i}`).join('\n')));

    assert.strictEqual(lines[0], '   1 -- 0');
    assert.strictEqual(lines[9], '  10 -- 9');
  });

  it('should mark a failing field with a cross', () => {
    const lines = capture(() => {
      field('Status', 'error', false);
      field('Model', 'gpt-4o-mini');
    });

    assert.deepStrictEqual(lines, ['  ✖ Status: error', '  ✔ Model: gpt-4o-mini']);
  });
});
