import { InvalidInputException } from "../common/exceptions";

const MAX_DOMAIN_LENGTH = 253;
const MAX_LABEL_LENGTH = 63;

// Letters, digits, hyphens and underscores; no leading or trailing hyphen.
const LABEL_PATTERN = /^[a-z0-9_]([a-z0-9_-]*[a-z0-9_])?$/;

export type DomainValidationResult =
  | { valid: true; domain: string }
  | { valid: false; error: string };

/**
 * Validates a bare host name (RFC 1123 labels, underscores tolerated) and
 * returns it trimmed and lower-cased. Schemes, paths, ports and wildcards are
 * rejected.
 */
export function validateDomain(input: unknown): DomainValidationResult {
  if (typeof input !== "string" || input.trim().length === 0) {
    return { valid: false, error: "Domain is required" };
  }

  const domain = input.trim().toLowerCase();

  if (domain.includes("://")) {
    return {
      valid: false,
      error: "Domain must not include a scheme (e.g. http://)",
    };
  }

  if (/[/\\?#@:\s]/.test(domain)) {
    return {
      valid: false,
      error:
        "Domain must be a bare host name without path, port, query or whitespace",
    };
  }

  if (domain.length > MAX_DOMAIN_LENGTH) {
    return {
      valid: false,
      error: `Domain must be ${MAX_DOMAIN_LENGTH} characters or less`,
    };
  }

  for (const label of domain.split(".")) {
    if (label.length === 0) {
      return {
        valid: false,
        error: "Domain contains an empty label (leading, trailing or consecutive dots)",
      };
    }
    if (label.length > MAX_LABEL_LENGTH) {
      return {
        valid: false,
        error: `Label "${label}" exceeds ${MAX_LABEL_LENGTH} characters`,
      };
    }
    if (!LABEL_PATTERN.test(label)) {
      return {
        valid: false,
        error: `Label "${label}" contains invalid characters`,
      };
    }
  }

  return { valid: true, domain };
}

/** Returns the normalized domain or throws InvalidInputException. */
export function normalizeDomain(input: unknown): string {
  const result = validateDomain(input);
  if (!result.valid) {
    throw new InvalidInputException(result.error, {
      domain: typeof input === "string" ? input : undefined,
    });
  }
  return result.domain;
}
