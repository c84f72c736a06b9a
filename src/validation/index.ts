export { validateConfig } from './validator';
export { createFieldChecker, rangeMessage } from './helpers';
export type { FieldChecker, Limits, ValidationError, ValidationResult, ValidationWarning } from './types';
