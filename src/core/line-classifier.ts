import { Classification } from '../common/interfaces/monitor.interfaces';
import { PatternMatcher } from './pattern-matcher';

const SEVERE_LEVELS = new Set(['error', 'panic', 'fatal']);
const ALERTING_RULE_KEYWORDS = ['error', 'panic'];

export const STRUCTURED_MESSAGE_PREFIX = 'structured: ';

/**
 * Fields read from a structured (JSON) line; anything else is ignored
 */
interface StructuredFields {
  level?: string;
  severity?: string;
  msg?: string;
  message?: string;
}

const BENIGN: Classification = Object.freeze({
  isAlert: false,
  message: null,
  source: null,
  ruleName: null,
  detail: null,
});

/**
 * Decides whether a log line is alert-worthy.
 *
 * Structured lines (leading `{`) are inspected for a severe `level` or
 * `severity` first. Everything that is not a severe structured record is
 * then checked against the compiled rules; only rules whose name mentions
 * "error" or "panic" raise an alert.
 */
export class LineClassifier {
  constructor(private readonly matcher: PatternMatcher) {}

  classify(line: string): Classification {
    const structured = this.classifyStructured(line);
    if (structured) {
      return structured;
    }
    return this.classifyByPattern(line);
  }

  private classifyStructured(line: string): Classification | null {
    if (!line.trimStart().startsWith('{')) {
      return null;
    }

    const fields = parseStructuredFields(line);
    if (!fields) {
      return null;
    }

    const level = fields.level ?? fields.severity;
    if (level === undefined || !SEVERE_LEVELS.has(level.toLowerCase())) {
      return null;
    }

    const detail = fields.message ?? fields.msg ?? line;
    return {
      isAlert: true,
      message: `${STRUCTURED_MESSAGE_PREFIX}${detail}`,
      source: 'structured',
      ruleName: null,
      detail,
    };
  }

  private classifyByPattern(line: string): Classification {
    const index = this.matcher.match(line);
    if (index === null) {
      return BENIGN;
    }

    const rule = this.matcher.ruleAt(index);
    if (!rule || !isAlertingRuleName(rule.name)) {
      return BENIGN;
    }

    return {
      isAlert: true,
      message: line,
      source: 'pattern',
      ruleName: rule.name,
      detail: line,
    };
  }
}

export function isAlertingRuleName(name: string): boolean {
  const lowered = name.toLowerCase();
  return ALERTING_RULE_KEYWORDS.some((keyword) => lowered.includes(keyword));
}

/**
 * Parse a JSON object line, keeping only the known fields. A known field
 * holding anything other than a string or null disqualifies the record.
 * Returns null for malformed JSON or non-object values.
 */
export function parseStructuredFields(line: string): StructuredFields | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }

  const fields: StructuredFields = {};
  for (const key of ['level', 'severity', 'msg', 'message'] as const) {
    const value: unknown = Reflect.get(parsed, key);
    if (typeof value === 'string') {
      fields[key] = value;
    } else if (value !== undefined && value !== null) {
      return null;
    }
  }
  return fields;
}
