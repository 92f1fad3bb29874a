import { createError } from '../errors';

export interface CropRange {
  start: number;
  end: number;
}

/** Parses a `start-end` pair of fractions of the frame, e.g. `0.4-0.6`. */
export function parseCropRange(value: string, name: string): CropRange | undefined {
  if (value === '') return undefined;

  const parts = value.split('-');
  if (parts.length !== 2) {
    throw createError('InvalidArgument', `${name} must be in format 'start-end' (e.g. '0.4-0.6')`, 'cli');
  }
  const [start, end] = parts.map(Number);
  if (parts.some((part) => part.trim() === '') || Number.isNaN(start) || Number.isNaN(end)) {
    throw createError('InvalidArgument', `invalid number in ${name}: ${value}`, 'cli');
  }
  if (start < 0 || end > 1 || start >= end) {
    throw createError(
      'InvalidArgument',
      `${name} values must be between 0 and 1, and start must be less than end`,
      'cli',
    );
  }
  return { start, end };
}

const f = (value: number) => value.toFixed(6);

/** ffmpeg `crop=w:h:x:y` expression, or undefined when neither axis is cropped. */
export function buildCropFilter(cropX?: CropRange, cropY?: CropRange) {
  if (cropX && cropY) {
    return `crop=iw*${f(cropX.end - cropX.start)}:ih*${f(cropY.end - cropY.start)}:iw*${f(cropX.start)}:ih*${f(cropY.start)}`;
  }
  if (cropX) {
    return `crop=iw*${f(cropX.end - cropX.start)}:ih:iw*${f(cropX.start)}:0`;
  }
  if (cropY) {
    return `crop=iw:ih*${f(cropY.end - cropY.start)}:0:ih*${f(cropY.start)}`;
  }
  return undefined;
}
