import * as assert from 'node:assert';
import { InstallError } from '../src/installer.js';
import { formatError } from '../src/reporter.js';

suite('InstallError', () => {
  test('outputTail keeps the last non-empty lines', () => {
    const error = new InstallError(['axios'], 1, 'a\n\nb  \nc\n');
    assert.strictEqual(error.outputTail(2), 'b\nc');
    assert.strictEqual(error.outputTail(), 'a\nb\nc');
  });
});

suite('formatError', () => {
  test('prints the message of a plain error', () => {
    assert.strictEqual(formatError(new Error('boom')), '\n\x1b[31mError: boom\x1b[0m\n');
  });

  test('shows what npm printed when an install fails', () => {
    const error = new InstallError([], 1, 'npm ERR! code E404\nnpm ERR! 404 Not Found\n');
    assert.strictEqual(
      formatError(error),
      '\n\x1b[31mError: npm install failed (exit code 1)\x1b[0m\n' +
      '\x1b[90m    npm ERR! code E404\n    npm ERR! 404 Not Found\x1b[0m\n'
    );
  });

  test('adds nothing when npm printed nothing', () => {
    const error = new InstallError(['tailwindcss'], null, '');
    assert.strictEqual(formatError(error), '\n\x1b[31mError: npm install tailwindcss failed (exit code none)\x1b[0m\n');
  });
});
