export {
  BindingError,
  bindShape,
  zeroValue,
  type BindingSource,
  type BindingSources,
  type FormValue,
  type ValueSource,
} from './binding';
export {
  Field,
  field,
  isFileType,
  type FieldKind,
  type FieldTags,
  type FieldType,
  type InferField,
} from './fields';
export { SchemaParseError, parseSchema, validate } from './parser';
export {
  Shape,
  shape,
  type FieldMap,
  type InferFields,
  type InferShape,
} from './shape';
export {
  describeShape,
  extractFields,
  formatRules,
  hasRule,
  hasSource,
  parseRules,
  parseTag,
  type FieldDescriptor,
  type FieldSources,
  type ParsedTag,
  type ValidationRule,
} from './tags';
