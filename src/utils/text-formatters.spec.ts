import { formatNumber, formatNumericSpec, markerBlock, padMarker } from './text-formatters';

describe('text-formatters', () => {
  describe('formatNumber', () => {
    it('should format integers without a decimal point', () => {
      const result = formatNumber(5);
      expect(result).toBe('5');
    });

    it('should keep decimals as written', () => {
      const result = formatNumber(0.25);
      expect(result).toBe('0.25');
    });

    it('should write negative zero as 0', () => {
      const result = formatNumber(-0);
      expect(result).toBe('0');
    });
  });

  describe('formatNumericSpec', () => {
    it('should write a percentage tolerance with a trailing %', () => {
      expect(formatNumericSpec({ kind: 'tolerance', value: 100, tolerance: 5, percent: true })).toBe(
        '100 +- 5%'
      );
    });

    it('should write absolute tolerances, bare values and ranges', () => {
      expect(formatNumericSpec({ kind: 'tolerance', value: 2, tolerance: 0.5 })).toBe('2 +- 0.5');
      expect(formatNumericSpec({ kind: 'tolerance', value: 2 })).toBe('2');
      expect(formatNumericSpec({ kind: 'range', min: -1, max: 1 })).toBe('[-1, 1]');
    });
  });

  describe('padMarker', () => {
    it('should pad short markers to four columns', () => {
      expect(padMarker('a)')).toBe('a)  ');
      expect(padMarker('=')).toBe('=   ');
      expect(padMarker('*a)')).toBe('*a) ');
    });

    it('should keep one space after markers that fill the column', () => {
      expect(padMarker('100.')).toBe('100. ');
    });
  });

  describe('markerBlock', () => {
    it('should indent continuation lines and keep blank lines empty', () => {
      const result = markerBlock('+', ['Yes.', '', 'Well done.']);
      expect(result).toEqual(['+   Yes.', '', '    Well done.']);
    });

    it('should trim the marker line when the text is empty', () => {
      const result = markerBlock('...', []);
      expect(result).toEqual(['...']);
    });
  });
});
