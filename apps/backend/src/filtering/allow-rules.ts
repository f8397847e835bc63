import { InvalidInputException } from "../common/exceptions";

const ALLOW_RULE_PATTERN = /^@@\|\|([^\^$|\s]+)\^(?:\$important)?$/i;

/** Canonical allow rule for an already normalized domain. */
export function allowRuleFor(domain: string): string {
  return `@@||${domain}^`;
}

/**
 * Domain unblocked by `rule`, or undefined when the rule is not a plain
 * `@@||domain^` (optionally `$important`) allow rule.
 */
export function allowedDomainOf(rule: string): string | undefined {
  const match = ALLOW_RULE_PATTERN.exec(rule.trim());
  return match ? match[1].toLowerCase() : undefined;
}

export function hasAllowRule(rules: readonly string[], domain: string): boolean {
  return rules.some((rule) => allowedDomainOf(rule) === domain);
}

export function allowedDomains(rules: readonly string[]): string[] {
  const domains = new Set<string>();
  for (const rule of rules) {
    const domain = allowedDomainOf(rule);
    if (domain) {
      domains.add(domain);
    }
  }
  return [...domains];
}

function comparable(rules: readonly string[]): string[] {
  return rules.map((rule) => rule.trim()).filter(Boolean);
}

/**
 * Compares two rule lists in order. `loose` ignores surrounding whitespace and
 * blank lines, which AdGuard Home may drop when it stores the list.
 */
export function sameRules(
  left: readonly string[],
  right: readonly string[],
  loose = false,
): boolean {
  const a = loose ? comparable(left) : left;
  const b = loose ? comparable(right) : right;
  return a.length === b.length && a.every((rule, index) => rule === b[index]);
}

/** Validates a caller-supplied rule list. Rules are stored one per line upstream. */
export function validateRules(input: unknown): string[] {
  if (!Array.isArray(input)) {
    throw new InvalidInputException("rules must be an array of strings");
  }

  const rules: string[] = [];
  input.forEach((rule: unknown, index) => {
    if (typeof rule !== "string") {
      throw new InvalidInputException(`rules[${index}] must be a string`);
    }
    if (/[\r\n]/.test(rule)) {
      throw new InvalidInputException(`rules[${index}] must be a single line`);
    }
    rules.push(rule);
  });

  return rules;
}
