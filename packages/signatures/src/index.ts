export const VERSION = "0.1.0";

// Signature and field model
export {
  FieldKind,
  Signature,
  checkFieldValue,
  describeValue,
  normalizeClassValue,
  validateFields,
  validateOutputs,
} from "./signature.js";
export type { ClassOutputOptions, Field, FieldCheck, FieldMap, FieldValue } from "./signature.js";

// Errors
export {
  ChainExhaustedError,
  EnumViolationError,
  FieldError,
  FieldMissingError,
  FieldTypeError,
  OutputParseError,
} from "./errors.js";
export type { AdapterFailure } from "./errors.js";

// Coercion
export { coerceValue, extractNumber, finalizeOutputs, parseBool } from "./coerce.js";
export type { CoerceOptions, Coerced, Finalized } from "./coerce.js";

// Few-shot examples and history
export { Example } from "./example.js";
export { History } from "./history.js";

// Adapters
export * from "./adapters/index.js";

// predict()
export { predict, responseText } from "./predict.js";
export type { PredictOptions, Prediction } from "./predict.js";
