export {
  operationSchema,
  inputBundleSchema,
  handleSchema,
  ciphertextKindSchema,
  validateOperation,
  type OperationValidationError,
  type OperationValidationResult,
} from './operations.js';
