import { testScript } from '../../index.js';

const { test } = testScript(import.meta.url);

test('test_echo', async (t) => {
  await t.assert('prints hello', '-o', 'hello', '--', 'echo', '-n', 'hello');
});

test('test_status', async (t) => {
  await t.assert('reports failure status', '-r', '1', '--', 'false');
});

test('helper_not_collected', () => false);
