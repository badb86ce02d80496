import { describe, it, expect } from 'vitest';
import { resolveTransformOptions } from '@/lib/options';
import { OptionRangeError } from '@/lib/errors';

describe('resolveTransformOptions', () => {
  it('fills in defaults', () => {
    expect(resolveTransformOptions()).toEqual({
      targetLayer: 0,
      sceneId: null,
      adjustFrames: false,
      isolateScenes: false,
      renumberObjects: true,
    });
  });

  it('accepts null target layer to keep layers', () => {
    expect(resolveTransformOptions({ targetLayer: null, sceneId: 2 })).toMatchObject({ targetLayer: null, sceneId: 2 });
  });

  it('rejects negative and fractional ids', () => {
    expect(() => resolveTransformOptions({ targetLayer: -1 })).toThrow(OptionRangeError);
    expect(() => resolveTransformOptions({ targetLayer: -1 })).toThrow('Invalid targetLayer: must be zero or greater');
    expect(() => resolveTransformOptions({ sceneId: 1.5 })).toThrow('Invalid sceneId: must be an integer');
  });

  it('names the option that is not a number', () => {
    let caught: unknown;
    try {
      resolveTransformOptions({ sceneId: Number('abc') });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(OptionRangeError);
    expect(caught).toMatchObject({ option: 'sceneId' });
  });
});
