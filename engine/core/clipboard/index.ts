/**
 * GridCalc Engine - Fill Module Exports
 */

export {
  FILL_DIRECTIONS,
  KNOWN_SEQUENCES,
  detectPattern,
  splitPrefixedNumber,
  formatFillNumber,
  generateValue,
  generateSeries,
  describePattern,
} from './FillSeries.js';
export type {
  FillDirection,
  FillPattern,
  KnownSequence,
  KnownSequenceName,
} from './FillSeries.js';
