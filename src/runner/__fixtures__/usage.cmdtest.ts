import { testScript } from '../../index.js';

const { test } = testScript(import.meta.url);

test('test_bad_assert', async (t) => {
  await t.assert('missing command', '-o', 'x');
});
