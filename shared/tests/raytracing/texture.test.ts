/**
 * Tests for ImageTexture sampling.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Vector3 } from '../../src/geometry/Vector3.js';
import { ImageTexture } from '../../src/raytracing/texture.js';
import { ValidationError } from '../../src/utils/errorTypes.js';

const RED = new Vector3(1, 0, 0);
const GREEN = new Vector3(0, 1, 0);
const BLUE = new Vector3(0, 0, 1);
const WHITE = new Vector3(1, 1, 1);

// 3x3, top row first: R G B / G B R / B R W
const texture = new ImageTexture(3, 3, [RED, GREEN, BLUE, GREEN, BLUE, RED, BLUE, RED, WHITE]);

describe('ImageTexture', () => {
  describe('construction', () => {
    it('should reject a pixel count that does not match the size', () => {
      assert.throws(() => new ImageTexture(2, 2, [RED]), /Expected 4 pixels, got 1/);
    });

    it('should reject non-positive dimensions', () => {
      assert.throws(() => new ImageTexture(0, 1, []), ValidationError);
      assert.throws(() => new ImageTexture(1, 1.5, [RED]), ValidationError);
    });

    it('should decode 8-bit RGBA bytes', () => {
      const decoded = ImageTexture.fromBytes(1, 1, [255, 0, 51, 255]);
      assert.ok(decoded.sample(0, 0).equals(new Vector3(1, 0, 0.2)));
    });

    it('should decode 8-bit RGB bytes', () => {
      const decoded = ImageTexture.fromBytes(2, 1, [0, 255, 0, 0, 0, 255], 3);
      assert.ok(decoded.sample(0, 0).equals(GREEN));
    });
  });

  describe('sample', () => {
    it('should address rows by 1 - v', () => {
      // v' = |frac(1 - v)|: v = 0 wraps to the top row, v = 0.9 lands there too
      assert.strictEqual(texture.sample(0, 0), RED);
      assert.strictEqual(texture.sample(0, 0.9), RED);
      // v = 0.25 → v' = 0.75 → y = floor(0.75 · 2) = 1
      assert.strictEqual(texture.sample(0, 0.25), GREEN);
    });

    it('should pick the nearest texel scaled by size - 1', () => {
      // u' = 0.5 → x = floor(0.5 · 2) = 1; v' = frac(0.5) = 0.5 → y = 1
      assert.strictEqual(texture.sample(0.5, 0.5), BLUE);
      // v = 0.25 → v' = 0.75 → y = floor(1.5) = 1
      assert.strictEqual(texture.sample(0.99, 0.25), BLUE);
    });

    it('should wrap coordinates outside [0, 1)', () => {
      assert.strictEqual(texture.sample(1.5, 0.5), texture.sample(0.5, 0.5));
      assert.strictEqual(texture.sample(2, 3), texture.sample(0, 0));
    });

    it('should use the magnitude of negative fractions', () => {
      // -0.5 % 1 = -0.5 → 0.5
      assert.strictEqual(texture.sample(-0.5, 0.5), texture.sample(0.5, 0.5));
    });
  });

  describe('checker placeholder', () => {
    it('should alternate two greys by cell', () => {
      const placeholder = ImageTexture.checker(4, 4, 2);
      const light = placeholder.sample(0, 0);
      assert.ok(light.equals(new Vector3(200 / 255, 200 / 255, 200 / 255)));
      // u' = 0.75 → x = floor(2.25) = 2, second cell
      assert.ok(placeholder.sample(0.75, 0).equals(new Vector3(100 / 255, 100 / 255, 100 / 255)));
    });
  });
});
