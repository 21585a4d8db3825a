/**
 * Source Location Tests
 */

import { describe, expect, it } from 'vitest';
import { formatDiagnostic, locationAt } from '../src/index.js';

describe('locationAt', () => {
  it('computes 1-based line and column', () => {
    expect(locationAt('ab\ncd', 4)).toEqual({ line: 2, column: 2, offset: 4 });
  });

  it('places a newline at the end of its own line', () => {
    expect(locationAt('ab\ncd', 2)).toEqual({ line: 1, column: 3, offset: 2 });
  });

  it('clamps offsets to the buffer', () => {
    expect(locationAt('ab', 10)).toEqual({ line: 1, column: 3, offset: 2 });
    expect(locationAt('ab', -1)).toEqual({ line: 1, column: 1, offset: 0 });
  });
});

describe('formatDiagnostic', () => {
  const location = { line: 2, column: 7, offset: 12 };

  it('prefixes the file name', () => {
    expect(
      formatDiagnostic("expected newline, got ':'", location, 'build.ninja')
    ).toBe("build.ninja:2:7: expected newline, got ':'");
  });

  it('omits a missing file name', () => {
    expect(formatDiagnostic('unexpected indent', location)).toBe(
      '2:7: unexpected indent'
    );
  });
});
