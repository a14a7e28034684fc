import assert from 'node:assert/strict';
import { extractSummary, parseUnitySummary } from '../src/summaryParser.js';

assert.deepEqual(parseUnitySummary('10 Tests 0 Failures 0 Ignored'), { tests: 10n, failures: 0n, ignored: 0n });

const progress = 'Running tests...\n5 Tests 1 Failures 0 Ignored\n(extra noise)\n5 Tests 0 Failures 0 Ignored';
const result = extractSummary(progress);
assert.ok(result.ok);
assert.deepEqual(result.summary, { tests: 5n, failures: 0n, ignored: 0n });
assert.strictEqual(result.matchCount, 2);
assert.strictEqual(result.offset, progress.lastIndexOf('5 Tests'));

// earlier tallies never leak into the final one
const descending = '100 Tests 50 Failures 2 Ignored\nretrying\n3 Tests 0 Failures 0 Ignored\n';
assert.deepEqual(parseUnitySummary(descending), { tests: 3n, failures: 0n, ignored: 0n });

const spread = 'TEST(Gpio, Toggle) PASS\n12\tTests\n3  Failures\r\n1 Ignored\nOK';
assert.deepEqual(parseUnitySummary(spread), { tests: 12n, failures: 3n, ignored: 1n });

const glued = 'x123 Tests 4 Failures 5 Ignored';
const gluedResult = extractSummary(glued);
assert.ok(gluedResult.ok);
assert.deepEqual(gluedResult.summary, { tests: 123n, failures: 4n, ignored: 5n });
assert.strictEqual(gluedResult.offset, 1);

const summaryInLine = '[qemu] -----------------------\n[qemu] 7 Tests 2 Failures 1 Ignored \n[qemu] FAIL';
assert.deepEqual(parseUnitySummary(summaryInLine), { tests: 7n, failures: 2n, ignored: 1n });

// counts past Number.MAX_SAFE_INTEGER keep every digit
assert.deepEqual(parseUnitySummary('12345678901234567890123 Tests 1 Failures 0 Ignored'), {
  tests: 12345678901234567890123n,
  failures: 1n,
  ignored: 0n,
});
const huge = '9'.repeat(400);
assert.strictEqual(parseUnitySummary(`${huge} Tests 0 Failures 0 Ignored`).tests.toString(), huge);

assert.deepEqual(extractSummary(progress), extractSummary(progress));
assert.deepEqual(parseUnitySummary(descending), parseUnitySummary(descending));

console.log('✓ last Unity summary line wins and parses all three counts');
