import { describe, it, expect } from 'vitest';
import {
  toLightParams,
  toPose,
  validateLightMessage,
  validatePoseMessage,
  validateSceneMessage,
  validateSelectionMessage,
  validateVisualMessage,
} from '../scene/messages';

describe('validateVisualMessage', () => {
  it('accepts a minimal create message', () => {
    expect(validateVisualMessage({ id: 'v1' })).toEqual({ ok: true, value: { id: 'v1', attributes: {} } });
  });

  it('keeps parent, action and known attributes', () => {
    const result = validateVisualMessage({
      id: 'arm',
      parentId: 'robot',
      action: 'update',
      attributes: { mesh: 'arm.dae', visible: false, transparency: 0.5, scale: [1, 2, 3] },
    });
    expect(result).toEqual({
      ok: true,
      value: {
        id: 'arm',
        parentId: 'robot',
        action: 'update',
        attributes: { mesh: 'arm.dae', visible: false, transparency: 0.5, scale: [1, 2, 3] },
      },
    });
  });

  it('treats a null parent as the scene root', () => {
    expect(validateVisualMessage({ id: 'v', parentId: null })).toEqual({ ok: true, value: { id: 'v', attributes: {} } });
  });

  it('skips attribute checks for delete messages', () => {
    expect(validateVisualMessage({ id: 'v', action: 'delete', attributes: 'garbage' })).toEqual({
      ok: true,
      value: { id: 'v', action: 'delete' },
    });
  });

  it.each([
    [null, 'visual message must be an object'],
    [{ id: '' }, 'id must be a non-empty string'],
    [{ id: 3 }, 'id must be a non-empty string'],
    [{ id: 'v', action: 'explode' }, 'unknown action: explode'],
    [{ id: 'v', parentId: 'v' }, 'visual cannot be its own parent'],
    [{ id: 'v', attributes: { visible: 'yes' } }, 'visible must be a boolean'],
    [{ id: 'v', attributes: { transparency: 2 } }, 'transparency must be a number in [0, 1]'],
    [{ id: 'v', attributes: { scale: [1, 2] } }, 'scale must be [x, y, z]'],
  ])('rejects %j', (raw, reason) => {
    expect(validateVisualMessage(raw)).toEqual({ ok: false, error: reason });
  });
});

describe('validateLightMessage', () => {
  it('accepts a light with optional fields', () => {
    const result = validateLightMessage({
      id: 'sun',
      type: 'directional',
      diffuse: [1, 0.9, 0.8],
      direction: [0, -1, 0],
      attenuation: { range: 100, linear: 0.01 },
    });
    expect(result).toEqual({
      ok: true,
      value: {
        id: 'sun',
        type: 'directional',
        diffuse: [1, 0.9, 0.8],
        direction: [0, -1, 0],
        attenuation: { range: 100, constant: 1, linear: 0.01, quadratic: 0 },
      },
    });
  });

  it.each([
    [{ id: 'l', type: 'laser' }, 'type must be one of point, spot, directional'],
    [{ id: 'l', type: 'point', diffuse: [2, 0, 0] }, 'diffuse must be [r, g, b] with components in [0, 1]'],
    [{ id: 'l', type: 'point', attenuation: { range: -1 } }, 'attenuation.range must be a non-negative number'],
    [{ type: 'point' }, 'id must be a non-empty string'],
  ])('rejects %j', (raw, reason) => {
    expect(validateLightMessage(raw)).toEqual({ ok: false, error: reason });
  });
});

describe('toLightParams', () => {
  it('fills defaults for omitted fields', () => {
    const params = toLightParams({ id: 'sun', type: 'directional' });
    expect(params.diffuse.toArray()).toEqual([1, 1, 1]);
    expect(params.specular.toArray()).toEqual([0.1, 0.1, 0.1]);
    expect(params.direction.toArray()).toEqual([0, 0, -1]);
    expect(params.attenuation).toEqual({ range: 10, constant: 1, linear: 0, quadratic: 0 });
    expect(params.castShadows).toBe(true);
  });

  it('keeps previous values for fields an update omits', () => {
    const first = toLightParams({ id: 'lamp', type: 'point', diffuse: [0.5, 0.25, 0], castShadows: true });
    const second = toLightParams({ id: 'lamp', type: 'spot', direction: [1, 0, 0] }, first);

    expect(second.type).toBe('spot');
    expect(second.diffuse.toArray()).toEqual([0.5, 0.25, 0]);
    expect(second.direction.toArray()).toEqual([1, 0, 0]);
    expect(second.castShadows).toBe(true);
    expect(second.diffuse).not.toBe(first.diffuse);
  });
});

describe('validatePoseMessage', () => {
  it('accepts position and orientation tuples', () => {
    expect(validatePoseMessage({ id: 'v', position: [1, 2, 3], orientation: [0, 0, 0, 1] })).toEqual({
      ok: true,
      value: { id: 'v', position: [1, 2, 3], orientation: [0, 0, 0, 1] },
    });
  });

  it.each([
    [{ id: 'v', position: [1, 2], orientation: [0, 0, 0, 1] }, 'position must be [x, y, z]'],
    [{ id: 'v', position: [1, 2, Number.NaN], orientation: [0, 0, 0, 1] }, 'position must be [x, y, z]'],
    [{ id: 'v', position: [1, 2, 3], orientation: [0, 0, 1] }, 'orientation must be [x, y, z, w]'],
    [{ id: 'v', position: [1, 2, 3], orientation: [0, 0, 0, 0] }, 'orientation must not be a zero quaternion'],
  ])('rejects %j', (raw, reason) => {
    expect(validatePoseMessage(raw)).toEqual({ ok: false, error: reason });
  });

  it('converts to a pose with a normalized orientation', () => {
    const p = toPose({ id: 'v', position: [1, 2, 3], orientation: [0, 0, 0, 2] });
    expect(p.position.toArray()).toEqual([1, 2, 3]);
    expect(p.orientation.toArray()).toEqual([0, 0, 0, 1]);
  });
});

describe('validateSelectionMessage', () => {
  it('accepts an identifier', () => {
    expect(validateSelectionMessage({ id: 'v' })).toEqual({ ok: true, value: { id: 'v' } });
  });

  it('maps null, missing and empty identifiers to no selection', () => {
    expect(validateSelectionMessage({ id: null })).toEqual({ ok: true, value: { id: null } });
    expect(validateSelectionMessage({})).toEqual({ ok: true, value: { id: null } });
    expect(validateSelectionMessage({ id: '' })).toEqual({ ok: true, value: { id: null } });
  });

  it('rejects non-string identifiers', () => {
    expect(validateSelectionMessage({ id: 5 })).toEqual({ ok: false, error: 'id must be a string or null' });
  });
});

describe('validateSceneMessage', () => {
  it('keeps the lists that are present', () => {
    expect(validateSceneMessage({ visuals: [{ id: 'a' }], poses: [] })).toEqual({
      ok: true,
      value: { visuals: [{ id: 'a' }], poses: [] },
    });
  });

  it('keeps a valid ambient color', () => {
    expect(validateSceneMessage({ ambient: [0.2, 0.2, 0.2] })).toEqual({
      ok: true,
      value: { ambient: [0.2, 0.2, 0.2] },
    });
  });

  it('rejects an ambient color that is not [r, g, b]', () => {
    expect(validateSceneMessage({ ambient: [0.2, 0.2] })).toEqual({
      ok: false,
      error: 'ambient must be [r, g, b] with components in [0, 1]',
    });
  });

  it('rejects a list that is not an array', () => {
    expect(validateSceneMessage({ lights: {} })).toEqual({ ok: false, error: 'lights must be an array' });
  });
});
