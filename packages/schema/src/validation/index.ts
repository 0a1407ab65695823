export {
  ShapeValidator,
  ValidationError,
  defaultValidator,
  type FieldError,
  type ShapeValidatorOptions,
} from './validator';
export { BUILT_IN_RULES, isZero, type RuleCheck } from './rules';
export {
  DEFAULT_LANGUAGE,
  TranslationRegistry,
  formatMessage,
  resolveLanguage,
} from './translations';
