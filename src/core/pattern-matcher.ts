import { Rule } from '../common/interfaces/monitor.interfaces';
import { ConfigError, describeError } from '../common/errors';

/**
 * Leading inline flag group, e.g. `(?i)` or `(?is)`. JavaScript has no inline
 * modifiers, so these are lifted into RegExp flags at compile time.
 */
const INLINE_FLAGS = /^\(\?([a-zA-Z]+)\)/;
const SUPPORTED_INLINE_FLAGS = new Set(['i', 'm', 's']);

/**
 * Ordered set of compiled rule patterns.
 *
 * Built once at startup and never mutated. `match` reports the
 * first-declared rule whose pattern matches anywhere in the line.
 */
export class PatternMatcher {
  private constructor(
    private readonly rules: ReadonlyArray<Rule>,
    private readonly expressions: ReadonlyArray<RegExp>,
  ) {}

  /**
   * Compile an ordered rule list into a matcher
   *
   * @throws {ConfigError} When any pattern is not a valid regular expression
   */
  static compile(rules: ReadonlyArray<Rule>): PatternMatcher {
    const errors: string[] = [];
    const expressions: RegExp[] = [];

    rules.forEach((rule, index) => {
      try {
        expressions.push(compilePattern(rule.pattern));
      } catch (error) {
        errors.push(`rules[${index}] "${rule.name}": ${describeError(error)}`);
      }
    });

    if (errors.length > 0) {
      throw new ConfigError(`Invalid rule pattern(s):\n  • ${errors.join('\n  • ')}`, errors);
    }

    return new PatternMatcher(rules.map((rule) => ({ ...rule })), expressions);
  }

  get size(): number {
    return this.expressions.length;
  }

  /**
   * @returns Lowest index among matching rules, or null when nothing matches
   */
  match(line: string): number | null {
    for (let index = 0; index < this.expressions.length; index++) {
      if (this.expressions[index].test(line)) {
        return index;
      }
    }
    return null;
  }

  ruleAt(index: number): Rule | undefined {
    return this.rules[index];
  }
}

/**
 * Compile a single pattern. Expressions never carry `g` or `y`, so `test`
 * keeps no state between calls.
 */
export function compilePattern(pattern: string): RegExp {
  const inline = INLINE_FLAGS.exec(pattern);
  if (!inline) {
    return new RegExp(pattern);
  }

  const flags = new Set<string>();
  for (const flag of inline[1]) {
    if (!SUPPORTED_INLINE_FLAGS.has(flag)) {
      throw new Error(`unsupported inline flag "${flag}"`);
    }
    flags.add(flag);
  }

  return new RegExp(pattern.slice(inline[0].length), [...flags].join(''));
}
