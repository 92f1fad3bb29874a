import { describe, expect, it } from 'vitest';
import { buildCropFilter, parseCropRange } from '../src/encoder/cropFilter';
import { isPipelineError } from '../src/errors';

const failureOf = (value: string) => {
  try {
    parseCropRange(value, 'crop-x');
  } catch (err) {
    return isPipelineError(err) ? [err.kind, err.message] : err;
  }
  return undefined;
};

describe('parseCropRange', () => {
  it('parses a start-end pair', () => {
    expect(parseCropRange('0.4-0.6', 'crop-x')).toEqual({ start: 0.4, end: 0.6 });
    expect(parseCropRange('0-1', 'crop-y')).toEqual({ start: 0, end: 1 });
  });

  it('treats empty input as no crop', () => {
    expect(parseCropRange('', 'crop-x')).toBeUndefined();
  });

  it('rejects malformed ranges', () => {
    expect(failureOf('0.4')).toEqual(['InvalidArgument', "crop-x must be in format 'start-end' (e.g. '0.4-0.6')"]);
    expect(failureOf('a-0.5')).toEqual(['InvalidArgument', 'invalid number in crop-x: a-0.5']);
    expect(failureOf('-0.5')).toEqual(['InvalidArgument', 'invalid number in crop-x: -0.5']);
  });

  it('rejects ranges outside the frame or inverted', () => {
    const message = 'crop-x values must be between 0 and 1, and start must be less than end';
    expect(failureOf('0.6-0.4')).toEqual(['InvalidArgument', message]);
    expect(failureOf('0.5-1.5')).toEqual(['InvalidArgument', message]);
    expect(failureOf('0.5-0.5')).toEqual(['InvalidArgument', message]);
  });
});

describe('buildCropFilter', () => {
  const x = { start: 0.4, end: 0.6 };
  const y = { start: 0.25, end: 0.75 };

  it('crops both axes', () => {
    expect(buildCropFilter(x, y)).toBe('crop=iw*0.200000:ih*0.500000:iw*0.400000:ih*0.250000');
  });

  it('crops one axis', () => {
    expect(buildCropFilter(x)).toBe('crop=iw*0.200000:ih:iw*0.400000:0');
    expect(buildCropFilter(undefined, y)).toBe('crop=iw:ih*0.500000:0:ih*0.250000');
  });

  it('returns nothing without a crop', () => {
    expect(buildCropFilter()).toBeUndefined();
  });
});
