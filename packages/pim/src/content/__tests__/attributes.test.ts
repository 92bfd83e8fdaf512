import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import type { AttributeDefinitionRecord } from '@shopsense/types';

import {
  coerceAttributeValue,
  formatAttributeValue,
  normalizeAttributes,
  orderAttributes,
  parseAttributeBag,
} from '../attributes.js';

function definition(overrides: Partial<AttributeDefinitionRecord>): AttributeDefinitionRecord {
  return {
    id: 'def-1',
    shopId: 'shop-1',
    name: 'color',
    displayName: 'Colour',
    dataType: 'text',
    includeInEmbedding: true,
    embeddingPriority: 0,
    semanticLabel: null,
    ...overrides,
  };
}

void describe('parseAttributeBag', () => {
  void it('reads a JSON object in key order', () => {
    const bag = parseAttributeBag('{"Color":"Red","Weight":2}');

    assert.equal(bag.malformed, false);
    assert.deepEqual([...bag.entries.keys()], ['Color', 'Weight']);
  });

  void it('treats a missing or blank blob as empty', () => {
    assert.deepEqual(parseAttributeBag(null), { entries: new Map(), malformed: false });
    assert.deepEqual(parseAttributeBag('   '), { entries: new Map(), malformed: false });
  });

  void it('flags unparseable or non-object blobs', () => {
    assert.deepEqual(parseAttributeBag('{oops'), { entries: new Map(), malformed: true });
    assert.deepEqual(parseAttributeBag('[1,2]'), { entries: new Map(), malformed: true });
  });
});

void describe('coerceAttributeValue', () => {
  void it('follows the declared data type', () => {
    assert.deepEqual(coerceAttributeValue('12.5', 'number'), { kind: 'number', value: 12.5 });
    assert.deepEqual(coerceAttributeValue('Yes', 'boolean'), { kind: 'boolean', value: true });
    assert.deepEqual(coerceAttributeValue('2024-05-01', 'date'), { kind: 'date', value: '2024-05-01' });
  });

  void it('falls back to text when the value does not fit the type', () => {
    assert.deepEqual(coerceAttributeValue('abc', 'number'), { kind: 'text', value: 'abc' });
    assert.deepEqual(coerceAttributeValue('soon', 'date'), { kind: 'text', value: 'soon' });
  });

  void it('infers primitives without a definition', () => {
    assert.deepEqual(coerceAttributeValue(3, undefined), { kind: 'number', value: 3 });
    assert.deepEqual(coerceAttributeValue(false, undefined), { kind: 'boolean', value: false });
    assert.deepEqual(coerceAttributeValue(['a', ' ', 'b'], undefined), { kind: 'text', value: 'a, b' });
    assert.deepEqual(coerceAttributeValue({ a: 1 }, undefined), { kind: 'text', value: '{"a":1}' });
  });

  void it('drops empty values', () => {
    assert.equal(coerceAttributeValue('  ', 'text'), null);
    assert.equal(coerceAttributeValue([], undefined), null);
    assert.equal(coerceAttributeValue({}, undefined), null);
    assert.equal(coerceAttributeValue(null, undefined), null);
  });
});

void describe('normalizeAttributes', () => {
  void it('resolves definitions case-insensitively and skips excluded keys', () => {
    const bag = new Map<string, unknown>([
      ['Color', 'Red'],
      ['Internal_Code', 'X1'],
      ['Weight', 2],
    ]);
    const definitions = [
      definition({ semanticLabel: 'Main color', embeddingPriority: 5 }),
      definition({ id: 'def-2', name: 'internal_code', includeInEmbedding: false }),
    ];

    const attributes = normalizeAttributes(bag, definitions);

    assert.deepEqual([...attributes.keys()], ['Color', 'Weight']);
    assert.deepEqual(attributes.get('Color'), {
      value: { kind: 'text', value: 'Red' },
      dataType: 'text',
      semanticLabel: 'Main color',
      priority: 5,
    });
    assert.deepEqual(attributes.get('Weight'), {
      value: { kind: 'number', value: 2 },
      dataType: 'number',
      semanticLabel: 'Weight',
      priority: 0,
    });
  });

  void it('orders by priority and keeps bag order for ties', () => {
    const bag = new Map<string, unknown>([
      ['b', 'x'],
      ['a', 'y'],
      ['top', 'z'],
    ]);
    const definitions = [definition({ id: 'def-3', name: 'top', embeddingPriority: 9 })];

    const ordered = orderAttributes(normalizeAttributes(bag, definitions)).map(([key]) => key);

    assert.deepEqual(ordered, ['top', 'b', 'a']);
  });
});

void describe('formatAttributeValue', () => {
  void it('renders booleans as Yes/No', () => {
    assert.equal(formatAttributeValue({ kind: 'boolean', value: true }), 'Yes');
    assert.equal(formatAttributeValue({ kind: 'boolean', value: false }), 'No');
    assert.equal(formatAttributeValue({ kind: 'number', value: 1.5 }), '1.5');
  });
});
