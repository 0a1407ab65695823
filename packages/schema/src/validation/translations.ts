export const DEFAULT_LANGUAGE = 'en';

/**
 * Per-language message templates keyed by rule name. Templates use `%s`
 * placeholders, filled in order with the field name and the rule param.
 *
 * @example
 * ```typescript
 * const translations = new TranslationRegistry();
 * translations.register('ja', 'required', '%s は必須です');
 * translations.translate('ja', 'required', ['name']); // 'name は必須です'
 * ```
 */
export class TranslationRegistry {
  private readonly messages = new Map<string, Map<string, string>>();

  register(lang: string, rule: string, message: string): void {
    const key = lang.toLowerCase();
    let table = this.messages.get(key);
    if (!table) {
      table = new Map();
      this.messages.set(key, table);
    }
    table.set(rule, message);
  }

  /**
   * Looks up the template for the exact language first, then for its
   * primary subtag (`pt-BR` → `pt`).
   */
  translate(
    lang: string,
    rule: string,
    args: ReadonlyArray<string>,
  ): string | undefined {
    const key = lang.toLowerCase();
    const candidates = [key, key.split('-')[0]];

    for (const candidate of candidates) {
      const template = this.messages.get(candidate)?.get(rule);
      if (template !== undefined) {
        return formatMessage(template, args);
      }
    }

    return undefined;
  }
}

export function formatMessage(
  template: string,
  args: ReadonlyArray<string>,
): string {
  let index = 0;
  return template.replace(/%s/g, (placeholder) => {
    if (index >= args.length) {
      return placeholder;
    }
    return args[index++];
  });
}

/**
 * Picks the preferred language from an Accept-Language header value:
 * the first listed tag with its quality weight dropped.
 */
export function resolveLanguage(acceptLanguage: string | undefined): string {
  const first = acceptLanguage?.split(',')[0]?.split(';')[0]?.trim();
  return first || DEFAULT_LANGUAGE;
}
