import type { CorrectionRule, CorrectionRuleSource } from '../types/index.js';

export type RuleWarning = (message: string) => void;

/**
 * Compile raw pattern/replacement pairs into case-insensitive global rules.
 * Entries that are not well formed, or whose pattern does not compile, are
 * skipped with a warning.
 */
export function compileCorrectionRules(
  sources: readonly unknown[],
  warn: RuleWarning = (message) => console.warn(message)
): readonly CorrectionRule[] {
  const rules: CorrectionRule[] = [];

  sources.forEach((source, index) => {
    if (!isRuleSource(source)) {
      warn(`Skipping correction rule #${index + 1}: expected { pattern, replacement } strings`);
      return;
    }
    if (source.pattern === '') {
      warn(`Skipping correction rule #${index + 1}: empty pattern`);
      return;
    }

    try {
      rules.push(Object.freeze({
        pattern: new RegExp(source.pattern, 'gi'),
        replacement: source.replacement,
      }));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      warn(`Skipping correction rule #${index + 1} (${source.pattern}): ${reason}`);
    }
  });

  return Object.freeze(rules);
}

/**
 * Fold the rules over the text in order, each one rewriting the output of the
 * previous one, then trim.
 */
export function applyCorrections(text: string, rules: readonly CorrectionRule[]): string {
  let corrected = text;
  for (const rule of rules) {
    corrected = corrected.replace(rule.pattern, rule.replacement);
  }
  return corrected.trim();
}

export class TextCorrector {
  constructor(private readonly rules: readonly CorrectionRule[]) {}

  static fromSources(sources: readonly unknown[], warn?: RuleWarning): TextCorrector {
    return new TextCorrector(compileCorrectionRules(sources, warn));
  }

  apply(text: string): string {
    return applyCorrections(text, this.rules);
  }

  get ruleCount(): number {
    return this.rules.length;
  }
}

function isRuleSource(value: unknown): value is CorrectionRuleSource {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return 'pattern' in value && typeof value.pattern === 'string'
    && 'replacement' in value && typeof value.replacement === 'string';
}
