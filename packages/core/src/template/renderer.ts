import { IncompleteTemplateError } from '../errors/index.js';
import type { TemplateParams } from '../types.js';

const PLACEHOLDER_PATTERN = /<([A-Z][A-Z0-9_]*)>/g;

export interface RenderOptions {
  /** Fail when any `<PLACEHOLDER>` token is left after substitution. */
  strict?: boolean;
}

/**
 * Replaces every `<KEY>` in the template with `params[KEY]`, keys taken in
 * insertion order. Substitution is textual: values are inserted as-is, and a
 * value containing another `<TOKEN>` may be replaced by a later key.
 * Tokens without a matching key are left in place unless `strict` is set.
 */
export function renderTemplate(source: string, params: TemplateParams, options: RenderOptions = {}): string {
  let rendered = source;
  for (const [key, value] of Object.entries(params)) {
    rendered = rendered.split(`<${key}>`).join(value);
  }

  if (options.strict) {
    const leftover = findPlaceholders(rendered);
    if (leftover.length > 0) {
      throw new IncompleteTemplateError(leftover);
    }
  }

  return rendered;
}

/** Distinct placeholder names in order of first appearance. */
export function findPlaceholders(source: string): string[] {
  const names = new Set<string>();
  for (const match of source.matchAll(PLACEHOLDER_PATTERN)) {
    names.add(match[1]);
  }
  return [...names];
}
