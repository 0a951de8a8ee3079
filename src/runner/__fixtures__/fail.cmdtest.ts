import { testScript } from '../../index.js';

const { test } = testScript(import.meta.url);

test('test_mismatch', async (t) => {
  await t.assert('expects world', '-o', 'world', '--', 'echo', 'hello');
});

test('test_match', async (t) => {
  await t.assert('prints hello', '-o', 'hello', '--', 'echo', 'hello');
});
