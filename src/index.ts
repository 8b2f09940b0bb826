export { AVRO_NAMES_VERSION } from './version.js';

export {
  PRIMITIVE_TYPE_NAMES,
  TypeDescriptionSchema,
  parseTypeDescription,
  safeParseTypeDescription,
} from './types/type-description.js';
export type {
  ArrayType,
  EnumType,
  FixedType,
  MapType,
  NamedType,
  PrimitiveType,
  PrimitiveTypeName,
  RecordField,
  RecordType,
  TypeDescription,
  TypeDescriptionInput,
  UnionType,
} from './types/type-description.js';

export {
  AvroTypeNames,
  RESERVED_TYPE_NAMES,
  isReservedTypeName,
} from './lib/constants.js';
export type { AvroTypeName } from './lib/constants.js';

export {
  getTypeFullname,
  getTypeName,
  getTypeNamespace,
  isNamedType,
} from './lib/accessors.js';

export {
  buildTypeFullname,
  makeFullname,
  splitFullname,
  splitTypeName,
} from './lib/names.js';
export type { SplitName } from './lib/names.js';

export { isCorrectDottedName, isCorrectName } from './lib/grammar.js';

export { assertValidType, verifyType, verifyTypes } from './lib/verify.js';
export type { IndexedNameError, VerifyResult, VerifyTypesResult } from './lib/verify.js';

export { canonicalizeType, collectNamedTypes } from './lib/canonicalize.js';

export { NameValidationError, invalidName, reservedName } from './lib/errors.js';
export type {
  InvalidNameError,
  NameError,
  NameErrorType,
  ReservedNameError,
} from './lib/errors.js';

export {
  formatNameErrors,
  nameErrorsToJson,
  printNameErrors,
  stripColors,
} from './lib/output.js';
export type { FormatOptions, JsonNameError, JsonNameErrors } from './lib/output.js';
