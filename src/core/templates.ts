/**
 * Response generator: renders a pattern template for one message.
 *
 * Placeholders look like `{firstName}` or `{firstName|there}`.
 * Rendering is all-or-nothing: a placeholder with no value and no
 * default fails the whole render with a TemplateError, and the caller
 * defers instead of sending half a sentence.
 */

import type { Classification, CompiledPattern, EngineConfig, Pattern, UserContext } from '../types/index.js';
import { TemplateError, ok, err, type Result } from './errors.js';

export type GeneratorOptions = Pick<EngineConfig, 'premiumPrefix' | 'urgencyPrefix' | 'urgentAcknowledgment'>;

const PLACEHOLDER = /\{(\w+)(?:\|([^}]*))?\}/g;

/** Placeholder names used by a template, in order of appearance */
export function placeholders(template: string): string[] {
  return [...new Set([...template.matchAll(PLACEHOLDER)].map(m => m[1]))];
}

export function timeOfDayGreeting(now: number): string {
  const hour = new Date(now).getUTCHours();
  if (hour >= 5 && hour < 12) return 'Good morning';
  if (hour >= 12 && hour < 18) return 'Good afternoon';
  return 'Good evening';
}

/** Values that come from the caller's user context */
function userValues(user: UserContext): Map<string, string> {
  const values = new Map<string, string>([['userId', user.userId]]);
  if (user.firstName) values.set('firstName', user.firstName);
  if (user.username) values.set('username', user.username);

  for (const [key, value] of Object.entries(user.attributes ?? {})) {
    if (value !== '') values.set(key, value);
  }
  return values;
}

/** Values tact derives on its own */
function derivedValues(classification: Classification, now: number): Map<string, string> {
  const values = new Map<string, string>([
    ['greeting', timeOfDayGreeting(now)],
    ['messageType', classification.detectedType],
  ]);
  if (classification.matchedKeywords.length > 0) {
    values.set('keywords', classification.matchedKeywords.join(', '));
  }
  return values;
}

function render(template: string, lookup: (name: string) => string | undefined): Result<string, TemplateError> {
  const missing: string[] = [];

  const rendered = template.replace(PLACEHOLDER, (_match, name: string, fallback: string | undefined) => {
    const value = lookup(name) ?? fallback;
    if (value === undefined) {
      missing.push(name);
      return '';
    }
    return value;
  });

  if (missing.length > 0) {
    return err(new TemplateError(`Template references unavailable context: ${missing.join(', ')}`, { missing }));
  }
  return ok(rendered);
}

export function generate(
  classification: Classification,
  user: UserContext,
  pattern: Pattern | CompiledPattern | undefined,
  now: number,
  options: GeneratorOptions
): Result<string, TemplateError> {
  const fromUser = userValues(user);
  const derived = derivedValues(classification, now);
  const lookup = (name: string) => fromUser.get(name) ?? derived.get(name);

  if (!pattern) {
    if (!classification.hasUrgencyMarkers) {
      return err(new TemplateError('No pattern to render a response from'));
    }
    return render(options.urgentAcknowledgment, lookup);
  }

  if (pattern.requiresContext) {
    const required = pattern.contextKeys.length > 0 ? pattern.contextKeys : placeholders(pattern.template);
    const missing = required.filter(key => !fromUser.has(key));
    if (missing.length > 0) {
      return err(new TemplateError(`Pattern ${pattern.id} requires context: ${missing.join(', ')}`, {
        patternId: pattern.id,
        missing,
      }));
    }
  }

  const rendered = render(pattern.template, lookup);
  if (!rendered.ok) return rendered;

  let response = rendered.value;
  if (user.isPremium) response = options.premiumPrefix + response;
  if (classification.hasUrgencyMarkers) response = options.urgencyPrefix + response;

  return ok(response);
}
