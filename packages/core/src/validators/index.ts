export { Validators, and } from './validators.js';
export { validate, isValid } from './evaluate.js';
export { showValidator } from './show.js';
export { validatorEquals, validatorListEquals } from './equality.js';
