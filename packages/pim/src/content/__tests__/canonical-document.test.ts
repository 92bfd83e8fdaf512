import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import type { AttributeDefinitionRecord } from '@shopsense/types';

import { makeProduct, SHOP_ID } from '../../__tests__/helpers/fakes.js';
import {
  buildCanonicalDocument,
  buildEmbeddingPayload,
  CANONICAL_SCHEMA_VERSION,
  deserializeCanonicalDocument,
  renderEmbeddingText,
  serializeCanonicalDocument,
} from '../canonical-document.js';

const GENERATED_AT = new Date('2026-02-01T10:00:00.000Z');

const DEFINITIONS: AttributeDefinitionRecord[] = [
  {
    id: 'def-wattage',
    shopId: SHOP_ID,
    name: 'wattage',
    displayName: 'Wattage',
    dataType: 'number',
    includeInEmbedding: true,
    embeddingPriority: 10,
    semanticLabel: 'Power (W)',
  },
  {
    id: 'def-color',
    shopId: SHOP_ID,
    name: 'color',
    displayName: 'Colour',
    dataType: 'text',
    includeInEmbedding: true,
    embeddingPriority: 1,
    semanticLabel: null,
  },
];

function buildLamp() {
  return buildCanonicalDocument({
    product: makeProduct({
      name: '  Desk   Lamp ',
      description: '<p>Warm <strong>light</strong> &amp; dimmer</p>',
      compareAtPrice: 59,
      stockQuantity: 0,
      attributes: '{"Color":"Red","Wattage":"40","Notes":""}',
    }),
    categoryName: 'Lighting',
    shopName: 'Bright Shop',
    attributeDefinitions: DEFINITIONS,
    generatedAt: GENERATED_AT,
  });
}

void describe('buildCanonicalDocument', () => {
  void it('normalizes text, flags and attributes', () => {
    const { document, malformedAttributes } = buildLamp();

    assert.equal(malformedAttributes, false);
    assert.equal(document.schemaVersion, CANONICAL_SCHEMA_VERSION);
    assert.equal(document.name, 'Desk Lamp');
    assert.equal(document.description, 'Warm light & dimmer');
    assert.equal(document.isOnSale, true);
    assert.equal(document.isInStock, false);
    assert.equal(document.generatedAt, '2026-02-01T10:00:00.000Z');
    assert.deepEqual([...document.attributes.keys()], ['Color', 'Wattage']);
    assert.deepEqual(document.attributes.get('Wattage')?.value, { kind: 'number', value: 40 });
  });

  void it('renders a deterministic embedding text', () => {
    const { document } = buildLamp();

    assert.equal(
      renderEmbeddingText(document),
      [
        'Product: Desk Lamp',
        'Shop: Bright Shop',
        'Category: Lighting',
        'Description: Warm light & dimmer',
        'Price: 49.50',
        'This product is currently on sale.',
        'This product is currently out of stock.',
        'Specifications:',
        '- Power (W): 40',
        '- Colour: Red',
      ].join('\n')
    );
  });

  void it('degrades to no attributes for a malformed blob', () => {
    const { document, malformedAttributes } = buildCanonicalDocument({
      product: makeProduct({ attributes: 'not json' }),
      categoryName: null,
      shopName: null,
      attributeDefinitions: DEFINITIONS,
      generatedAt: GENERATED_AT,
    });

    assert.equal(malformedAttributes, true);
    assert.equal(document.attributes.size, 0);
    assert.equal(renderEmbeddingText(document), 'Product: Desk Lamp\nDescription: Warm light\nPrice: 49.50');
  });

  void it('builds the display payload from the document', () => {
    const { document } = buildLamp();

    assert.deepEqual(buildEmbeddingPayload(document), {
      productId: document.productId,
      name: 'Desk Lamp',
      shopId: SHOP_ID,
      shopName: 'Bright Shop',
      categoryName: 'Lighting',
      price: 49.5,
      isInStock: false,
      isOnSale: true,
      sku: 'DL-1',
    });
  });
});

void describe('canonical document persistence', () => {
  void it('restores a serialized document', () => {
    const { document } = buildLamp();

    assert.deepEqual(deserializeCanonicalDocument(serializeCanonicalDocument(document)), document);
  });

  void it('rejects unreadable documents', () => {
    assert.equal(deserializeCanonicalDocument('{'), null);
    assert.equal(deserializeCanonicalDocument('{"schemaVersion":"one"}'), null);
  });
});
