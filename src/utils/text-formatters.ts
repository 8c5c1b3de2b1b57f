/**
 * Utility functions for text formatting
 */

import { NumericAnswer } from '../models/quiz.model';

/** Width of a plaintext marker column and of a continuation indent */
export const MARKER_WIDTH = 4;

/**
 * Format a number the way an author would type it
 * @example
 * formatNumber(5) // returns '5'
 * formatNumber(0.25) // returns '0.25'
 * formatNumber(-0) // returns '0'
 */
export function formatNumber(value: number): string {
  return Object.is(value, -0) ? '0' : String(value);
}

/**
 * Numeric answer as both formats write it after `=`
 * @example
 * formatNumericSpec({ kind: 'tolerance', value: 100, tolerance: 5, percent: true }) // returns '100 +- 5%'
 * formatNumericSpec({ kind: 'range', min: 1, max: 2 }) // returns '[1, 2]'
 */
export function formatNumericSpec(answer: NumericAnswer): string {
  if (answer.kind === 'range') {
    return `[${formatNumber(answer.min)}, ${formatNumber(answer.max)}]`;
  }
  if (answer.tolerance === undefined) {
    return formatNumber(answer.value);
  }
  const unit = answer.percent ? '%' : '';
  return `${formatNumber(answer.value)} +- ${formatNumber(answer.tolerance)}${unit}`;
}

/**
 * Pad a marker to the marker column, keeping at least one space before the
 * text that follows
 * @example
 * padMarker('a)') // returns 'a)  '
 * padMarker('*a)') // returns '*a) '
 * padMarker('10.') // returns '10. '
 * padMarker('100.') // returns '100. '
 */
export function padMarker(marker: string): string {
  return marker.length < MARKER_WIDTH ? marker.padEnd(MARKER_WIDTH) : `${marker} `;
}

/**
 * Marker line followed by indented continuation lines; blank lines stay empty
 * @example
 * markerBlock('+', ['Yes.', '', 'Well done.']) // returns ['+   Yes.', '', '    Well done.']
 */
export function markerBlock(marker: string, lines: string[]): string[] {
  const [first = '', ...rest] = lines;
  return [
    `${padMarker(marker)}${first}`.trimEnd(),
    ...rest.map(line => (line === '' ? '' : `${' '.repeat(MARKER_WIDTH)}${line}`)),
  ];
}
