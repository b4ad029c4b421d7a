/**
 * Tests for scene assembly, background lookup and scene-wide queries.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Ray } from '../../src/geometry/Ray.js';
import { Vector3 } from '../../src/geometry/Vector3.js';
import { createMaterial } from '../../src/raytracing/material.js';
import { createBox, createPlane } from '../../src/raytracing/primitives.js';
import {
  backgroundColor,
  createScene,
  gradientBackground,
  isOccluded,
  nearestHit,
  solidBackground,
} from '../../src/raytracing/scene.js';

const T_MIN = 0.001;
const red = createMaterial({ color: new Vector3(1, 0, 0) });
const blue = createMaterial({ color: new Vector3(0, 0, 1) });

describe('createScene', () => {
  it('should default to an empty black scene', () => {
    const scene = createScene();
    assert.strictEqual(scene.primitives.length, 0);
    assert.strictEqual(scene.lights.length, 0);
    assert.deepStrictEqual(scene.background, { kind: 'solid', color: Vector3.zero });
    assert.deepStrictEqual(scene.ambient.toTuple(), [0, 0, 0]);
  });

  it('should freeze the scene and its lists', () => {
    const scene = createScene({ primitives: [createBox(Vector3.zero, Vector3.one, red)] });
    assert.ok(Object.isFrozen(scene));
    assert.ok(Object.isFrozen(scene.primitives));
  });

  it('should copy the primitive list', () => {
    const primitives = [createBox(Vector3.zero, Vector3.one, red)];
    const scene = createScene({ primitives });
    primitives.push(createBox(Vector3.one, Vector3.one, blue));
    assert.strictEqual(scene.primitives.length, 1);
  });
});

describe('backgroundColor', () => {
  it('should return a solid color for any direction', () => {
    const background = solidBackground(new Vector3(0.1, 0.2, 0.3));
    assert.deepStrictEqual(backgroundColor(background, new Vector3(0, -1, 0)).toTuple(), [0.1, 0.2, 0.3]);
  });

  it('should blend from horizon to zenith by direction.y', () => {
    const background = gradientBackground(new Vector3(1, 1, 1), new Vector3(0, 0, 1));
    assert.deepStrictEqual(backgroundColor(background, new Vector3(1, 0, 0)).toTuple(), [1, 1, 1]);
    assert.deepStrictEqual(backgroundColor(background, new Vector3(0, 1, 0)).toTuple(), [0, 0, 1]);
    assert.deepStrictEqual(backgroundColor(background, new Vector3(0, 0.5, 0)).toTuple(), [0.5, 0.5, 1]);
  });

  it('should use the ground color below the horizon', () => {
    const background = gradientBackground(new Vector3(1, 1, 1), new Vector3(0, 0, 1), new Vector3(0.2, 0.2, 0.2));
    assert.deepStrictEqual(backgroundColor(background, new Vector3(0, -0.5, 0)).toTuple(), [0.2, 0.2, 0.2]);
  });

  it('should fall back to the horizon color without a ground color', () => {
    const background = gradientBackground(new Vector3(1, 1, 1), new Vector3(0, 0, 1));
    assert.deepStrictEqual(backgroundColor(background, new Vector3(0, -0.5, 0)).toTuple(), [1, 1, 1]);
  });
});

describe('nearestHit', () => {
  it('should return null for an empty scene', () => {
    const ray = new Ray(Vector3.zero, new Vector3(0, 0, -1));
    assert.strictEqual(nearestHit(createScene(), ray, T_MIN, Infinity), null);
  });

  it('should pick the closest primitive regardless of order', () => {
    const far = createBox(new Vector3(0, 0, -10), Vector3.one, blue);
    const near = createBox(new Vector3(0, 0, -5), Vector3.one, red);
    const ray = new Ray(Vector3.zero, new Vector3(0, 0, -1));

    for (const primitives of [[far, near], [near, far]]) {
      const hit = nearestHit(createScene({ primitives }), ray, T_MIN, Infinity);
      assert.ok(hit);
      assert.strictEqual(hit.t, 4);
      assert.strictEqual(hit.material, red);
    }
  });

  it('should keep the earlier primitive on an exact tie', () => {
    const first = createPlane(new Vector3(0, 0, -3), new Vector3(0, 0, 1), red);
    const second = createPlane(new Vector3(0, 0, -3), new Vector3(0, 0, 1), blue);
    const ray = new Ray(Vector3.zero, new Vector3(0, 0, -1));

    const hit = nearestHit(createScene({ primitives: [first, second] }), ray, T_MIN, Infinity);
    assert.strictEqual(hit?.material, red);
  });

  it('should ignore hits closer than tMin', () => {
    const plane = createPlane(new Vector3(0, 0, -0.0005), new Vector3(0, 0, 1), red);
    const ray = new Ray(Vector3.zero, new Vector3(0, 0, -1));
    assert.strictEqual(nearestHit(createScene({ primitives: [plane] }), ray, T_MIN, Infinity), null);
  });
});

describe('isOccluded', () => {
  const blocker = createBox(new Vector3(0, 2, 0), new Vector3(1, 0.5, 1), red);
  const scene = createScene({ primitives: [blocker] });

  it('should report a primitive between the point and the light', () => {
    assert.strictEqual(isOccluded(scene, Vector3.zero, new Vector3(0, 5, 0), T_MIN), true);
  });

  it('should ignore primitives beyond the light', () => {
    assert.strictEqual(isOccluded(scene, Vector3.zero, new Vector3(0, 1, 0), T_MIN), false);
  });

  it('should ignore primitives off the segment', () => {
    assert.strictEqual(isOccluded(scene, Vector3.zero, new Vector3(5, 0, 0), T_MIN), false);
  });

  it('should treat a light at the point as visible', () => {
    assert.strictEqual(isOccluded(scene, Vector3.zero, Vector3.zero, T_MIN), false);
  });
});
