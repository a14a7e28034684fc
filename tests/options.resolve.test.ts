import assert from 'node:assert/strict';
import { resolveOptions } from '../src/options.js';

assert.deepEqual(resolveOptions({}, {}, false), { verbose: false, color: false });
assert.deepEqual(resolveOptions({ verbose: true }, {}, true), { verbose: true, color: true });
assert.deepEqual(resolveOptions({ debug: true }, {}, false), { verbose: true, color: false });
assert.strictEqual(resolveOptions({}, { DEBUG: '1' }, false).verbose, true);
assert.strictEqual(resolveOptions({}, { UNITY_SUMMARY_DEBUG: 'true' }, false).verbose, true);
assert.strictEqual(resolveOptions({}, { UNITY_SUMMARY_DEBUG: 'false' }, false).verbose, false);
assert.strictEqual(resolveOptions({}, { UNITY_SUMMARY_DEBUG: '  ' }, false).verbose, false);

console.log('✓ options combine flags with debug environment variables');
