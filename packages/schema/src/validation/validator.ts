import type { Shape } from '../shape';
import {
  type FieldDescriptor,
  type ValidationRule,
  describeShape,
} from '../tags';
import { BUILT_IN_RULES, type RuleCheck, isZero } from './rules';
import {
  DEFAULT_LANGUAGE,
  TranslationRegistry,
  formatMessage,
} from './translations';

export interface FieldError {
  /** Declared name of the failing field */
  field: string;
  /** Declared names from the root shape down to the failing field */
  path: string[];
  rule: string;
  param?: string;
  message: string;
}

const DEFAULT_MESSAGES: Record<string, string> = {
  required: '%s is required',
  email: '%s must be a valid email address',
  min: '%s must be at least %s characters',
  max: '%s must be at most %s characters',
  len: '%s must be exactly %s characters',
  numeric: '%s must be numeric',
  alpha: '%s must contain only letters',
  alphanum: '%s must contain only letters and numbers',
};

export class ValidationError extends Error {
  constructor(readonly errors: FieldError[]) {
    super(`validation failed: ${errors.map((e) => e.message).join('; ')}`);
    this.name = 'ValidationError';
  }
}

export interface ShapeValidatorOptions {
  translations?: TranslationRegistry;
}

/**
 * Evaluates the `validate` rules of a shape against a bound value.
 *
 * Rules run in declaration order and stop at the first failure of each
 * field. `omitempty` skips the remaining rules of a zero-valued field.
 * Rules without a registered check are ignored. Nested shapes are
 * validated recursively.
 */
export class ShapeValidator {
  readonly translations: TranslationRegistry;
  private readonly rules = new Map<string, RuleCheck>(
    Object.entries(BUILT_IN_RULES),
  );

  constructor(options: ShapeValidatorOptions = {}) {
    this.translations = options.translations ?? new TranslationRegistry();
  }

  registerRule(name: string, check: RuleCheck): this {
    this.rules.set(name, check);
    return this;
  }

  /**
   * Registers a translated message for a rule.
   *
   * @example
   * ```typescript
   * validator.registerTranslation('ja', 'required', '%s は必須です');
   * ```
   */
  registerTranslation(lang: string, rule: string, message: string): this {
    this.translations.register(lang, rule, message);
    return this;
  }

  validate<T>(
    shape: Shape<T>,
    value: T,
    lang: string = DEFAULT_LANGUAGE,
  ): FieldError[] {
    const errors: FieldError[] = [];
    this.validateObject(shape, value, lang, [], errors, new Set());
    return errors;
  }

  /**
   * @throws {ValidationError} When any rule fails
   */
  assert<T>(shape: Shape<T>, value: T, lang?: string): void {
    const errors = this.validate(shape, value, lang);
    if (errors.length > 0) {
      throw new ValidationError(errors);
    }
  }

  private validateObject(
    shape: Shape<unknown>,
    value: unknown,
    lang: string,
    path: string[],
    errors: FieldError[],
    visiting: Set<object>,
  ): void {
    if (value === null || typeof value !== 'object' || visiting.has(value)) {
      return;
    }
    visiting.add(value);

    for (const descriptor of describeShape(shape)) {
      const fieldValue: unknown = Reflect.get(value, descriptor.name);
      const fieldPath = [...path, descriptor.name];

      const failed = this.firstFailure(descriptor, fieldValue);
      if (failed) {
        errors.push({
          field: descriptor.name,
          path: fieldPath,
          rule: failed.name,
          ...(failed.param !== undefined && { param: failed.param }),
          message: this.message(descriptor.name, failed, lang),
        });
        continue;
      }

      if (descriptor.type.kind === 'shape') {
        this.validateObject(
          descriptor.type.shape(),
          fieldValue,
          lang,
          fieldPath,
          errors,
          visiting,
        );
      }
    }

    visiting.delete(value);
  }

  private firstFailure(
    descriptor: FieldDescriptor,
    value: unknown,
  ): ValidationRule | undefined {
    for (const rule of descriptor.rules) {
      if (rule.name === 'omitempty') {
        if (isZero(value)) {
          return undefined;
        }
        continue;
      }

      const check = this.rules.get(rule.name);
      if (check && !check(value, rule.param, descriptor.type)) {
        return rule;
      }
    }
    return undefined;
  }

  private message(field: string, rule: ValidationRule, lang: string): string {
    const args = rule.param ? [field, rule.param] : [field];
    const translated = this.translations.translate(lang, rule.name, args);
    if (translated !== undefined) {
      return translated;
    }

    const template = DEFAULT_MESSAGES[rule.name];
    if (template) {
      return formatMessage(template, args);
    }
    return `${field} failed validation for ${rule.name}`;
  }
}

/** Validator used by `Shape['~standard']`; English messages, built-in rules */
export const defaultValidator = new ShapeValidator();
