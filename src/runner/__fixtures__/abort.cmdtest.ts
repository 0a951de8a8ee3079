import { testScript } from '../../index.js';

const { test } = testScript(import.meta.url);

test('test_exits_early', async (t) => {
  await t.assert('writes to stderr', '-e', 'oops', '--', 'sh', '-c', 'echo oops >&2');
  process.exit(0);
});
