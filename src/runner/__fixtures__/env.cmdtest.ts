import { testScript } from '../../index.js';

const { test } = testScript(import.meta.url);

test('test_hook_variable', async (t) => {
  await t.assert('sees hook output', '-o', 'from-hook', '--', 'sh', '-c', 'printf %s "$GREETING"');
});

test('test_source_dir', (t) => t.env.TEST_SOURCE_DIR !== undefined);
