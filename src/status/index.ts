/**
 * Status Module
 *
 * Stock status classification and the fixed category scales.
 */

export { classifyStatus, biomassCategory, combinedCategory } from './classifier';
export {
  categoryScale,
  labelFor,
  THREE_CLASS_LEVELS,
  THREE_CLASS_COLORS,
  FOUR_CLASS_LEVELS,
  FOUR_CLASS_COLORS
} from './scales';
export type {
  Category3Code,
  Category4Code,
  CategoryCount,
  CategoryScale,
  ClassifiedRow,
  StatusClassifier
} from './types';
