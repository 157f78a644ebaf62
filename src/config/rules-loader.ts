import fs from 'fs';
import Joi from 'joi';
import { Rule } from '../common/interfaces/monitor.interfaces';
import { ConfigError, describeError } from '../common/errors';

/**
 * Rules used when no rules file exists
 */
export const DEFAULT_RULES: ReadonlyArray<Rule> = Object.freeze([
  { name: 'Error', pattern: '(?i)error', threshold: 1 },
  { name: 'Panic', pattern: '(?i)panic', threshold: 1 },
]);

const ruleSchema = Joi.object<Rule>({
  name: Joi.string().trim().min(1).required(),
  pattern: Joi.string().min(1).required(),
  threshold: Joi.number()
    .integer()
    .min(0)
    .default(1)
    .description('Occurrence threshold; carried for compatibility, not enforced'),
});

const rulesSchema = Joi.array<Rule[]>().items(ruleSchema).required();

/**
 * Validate already-parsed rules content: either a bare array of rules or
 * an object with a `rules` array
 *
 * @throws {ConfigError} When the content does not describe a rule list
 */
export function parseRules(content: unknown, origin = 'rules'): Rule[] {
  const rules: unknown =
    typeof content === 'object' && content !== null && !Array.isArray(content)
      ? Reflect.get(content, 'rules')
      : content;

  const result = rulesSchema.validate(rules, {
    abortEarly: false,
    convert: true,
  });

  if (result.error) {
    const details = result.error.details.map(
      (detail) => `rules${detail.path.map((segment) => `[${String(segment)}]`).join('')}: ${detail.message}`,
    );
    throw new ConfigError(`Invalid rules in ${origin}:\n  • ${details.join('\n  • ')}`, details);
  }

  return result.value.map((rule) => ({ name: rule.name, pattern: rule.pattern, threshold: rule.threshold }));
}

/**
 * Load rules from a JSON file, falling back to {@link DEFAULT_RULES} when
 * the file does not exist
 *
 * @throws {ConfigError} When the file exists but cannot be read or is invalid
 */
export function loadRules(filePath: string): Rule[] {
  if (!fs.existsSync(filePath)) {
    return DEFAULT_RULES.map((rule) => ({ ...rule }));
  }

  let content: unknown;
  try {
    content = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to read rules file ${filePath}: ${describeError(error)}`);
  }

  return parseRules(content, filePath);
}
