export {
  namingPolicyNameSchema,
  namingPolicySchema,
  discriminatorFieldSchema,
  configurationInputSchema,
  validatorShapeSchema,
  schemaDefaultSchema,
  annotationsSchema,
} from './schemas.js';
export type { NamingPolicyNameInput, AnnotationsInput } from './schemas.js';
