import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parseDetectionMode, parseDistanceModel, parseInteger, parseLevel, parseNumber } from './options';

describe('CLI option parsers', () => {
  it('accepts every distance model in either spelling', () => {
    expect(parseDistanceModel('planar')).toBe('PLANAR');
    expect(parseDistanceModel('great-circle')).toBe('GREAT_CIRCLE');
    expect(parseDistanceModel('vincenty')).toBe('VINCENTY');
    expect(parseDistanceModel('VINCENTY')).toBe('VINCENTY');
    expect(() => parseDistanceModel('rhumb')).toThrow(InvalidArgumentError);
  });

  it('accepts detection modes case-insensitively', () => {
    expect(parseDetectionMode('probabilistic')).toBe('PROBABILISTIC');
    expect(() => parseDetectionMode('psychic')).toThrow(InvalidArgumentError);
  });

  it('rejects malformed numbers', () => {
    expect(parseInteger('12')).toBe(12);
    expect(() => parseInteger('1.5')).toThrow(InvalidArgumentError);
    expect(parseNumber('0.5')).toBe(0.5);
    expect(() => parseNumber('fast')).toThrow(InvalidArgumentError);
  });

  it('knows the log levels', () => {
    expect(parseLevel('DEBUG')).toBe('debug');
    expect(() => parseLevel('loud')).toThrow(InvalidArgumentError);
  });
});
