import test from 'node:test';
import assert from 'node:assert/strict';
import {
  conversionActionByNameQuery,
  conversionActionResourceName,
  escapeGaqlString,
  extractConversionActionId,
} from '@/lib/providers/google_ads/mapper';

test('escapeGaqlString: quotes are escaped', () => {
  assert.equal(escapeGaqlString("it's"), "it\\'s");
});

test('escapeGaqlString: backslashes are escaped before quotes', () => {
  assert.equal(escapeGaqlString('foo\\'), 'foo\\\\');
  assert.equal(escapeGaqlString("a\\'b"), "a\\\\\\'b");
});

test('conversionActionByNameQuery: a trailing backslash still closes the literal', () => {
  assert.equal(
    conversionActionByNameQuery('Lead\\'),
    "SELECT conversion_action.id, conversion_action.name FROM conversion_action WHERE conversion_action.name = 'Lead\\\\'"
  );
});

test('resource name round trip', () => {
  const name = conversionActionResourceName('1234567890', '555');
  assert.equal(name, 'customers/1234567890/conversionActions/555');
  assert.equal(extractConversionActionId(name), '555');
  assert.equal(extractConversionActionId('customers/1/campaigns/2'), null);
});
