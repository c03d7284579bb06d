import { describe, it, expect, beforeEach } from 'vitest';
import { enforceMaxDuration } from '../../core/DurationConstraint';
import { BoundsModel } from '../../core/BoundsModel';
import { TimeMapper } from '../../core/TimeMapper';
import { createAsset, createSurface } from '../helpers/fixtures';
import type { FakeSurface } from '../helpers/fixtures';

describe('enforceMaxDuration', () => {
  let surface: FakeSurface;
  let mapper: TimeMapper;
  let model: BoundsModel;

  beforeEach(() => {
    surface = createSurface(200, 220);
    mapper = new TimeMapper(createAsset(10), surface);
    model = new BoundsModel(mapper, surface, { handleWidth: 10, minDuration: 1 });
  });

  const selected = () => (mapper.timeFor(model.endPosition) ?? 0) - (mapper.timeFor(model.startPosition) ?? 0);

  it('should do nothing without a cap', () => {
    expect(enforceMaxDuration(model, mapper, Number.POSITIVE_INFINITY, 'trimStart')).toBeNull();
    expect(model.bounds.rightOffset).toBe(0);
  });

  it('should do nothing when the interval fits', () => {
    expect(enforceMaxDuration(model, mapper, 10, 'trimStart')).toBeNull();
  });

  it('should pull the end handle in when the start handle moved', () => {
    model.commit('trimStart', 40);

    expect(enforceMaxDuration(model, mapper, 4, 'trimStart')).toBe('trimEnd');
    expect(model.bounds.rightOffset).toBe(-80);
    expect(model.bounds.leftOffset).toBe(40);
    expect(selected()).toBeCloseTo(4, 9);
  });

  it('should push the start handle in when the end handle moved', () => {
    model.commit('trimEnd', -20);

    expect(enforceMaxDuration(model, mapper, 4, 'trimEnd')).toBe('trimStart');
    expect(model.bounds.leftOffset).toBe(100);
    expect(model.bounds.rightOffset).toBe(-20);
    expect(selected()).toBeCloseTo(4, 9);
  });

  it('should cut a full selection down to the cap', () => {
    expect(enforceMaxDuration(model, mapper, 5, 'trimStart')).toBe('trimEnd');
    expect(model.bounds.rightOffset).toBe(-100);
    expect(mapper.timeFor(model.endPosition)).toBeCloseTo(5, 9);
  });

  it('should pin the end handle to the natural edge when the target passes the asset end', () => {
    // Scrolled so the end handle sits past the content: 2.5s .. 12.5s
    surface.scroll = 50;

    expect(enforceMaxDuration(model, mapper, 9, 'trimStart')).toBeNull();
    expect(model.bounds.rightOffset).toBe(0);
  });

  it('should do nothing without an asset', () => {
    const empty = new TimeMapper(createAsset(undefined), surface);
    const emptyModel = new BoundsModel(empty, surface, { handleWidth: 10, minDuration: 1 });

    expect(enforceMaxDuration(emptyModel, empty, 1, 'trimStart')).toBeNull();
  });
});
