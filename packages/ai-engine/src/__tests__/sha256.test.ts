import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { sha256Hex } from '../hash.js';

void describe('sha256Hex', () => {
  void it('is deterministic for the same chunk text', () => {
    const text = 'Product: Desk Lamp\nPrice: $19.99';
    assert.equal(sha256Hex(text), sha256Hex(text));
    assert.equal(sha256Hex(text).length, 64);
  });

  void it('changes when the text changes', () => {
    assert.notEqual(sha256Hex('Price: $19.99'), sha256Hex('Price: $18.99'));
  });

  void it('hashes the empty string to the well-known digest', () => {
    assert.equal(sha256Hex(''), 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });
});
