export { applyValidation, isValidFor } from './apply-validation.js';
