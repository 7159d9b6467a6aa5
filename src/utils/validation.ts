/**
 * Input validation for CLI arguments and config values
 */

const MAX_DIMENSION = 500;
const MAX_VALUES = 10000;

export interface ValidationResult<T = string> {
  valid: boolean;
  sanitized?: T;
  error?: string;
}

export interface LabeledValue {
  label: string;
  value: number;
}

/**
 * Split arguments on whitespace and commas, dropping empties
 */
function splitTokens(args: readonly string[]): string[] {
  return args
    .flatMap(arg => arg.split(/[\s,]+/))
    .map(token => token.trim())
    .filter(token => token.length > 0);
}

/**
 * Parse numbers given as separate args or comma lists ("1,2,3")
 */
export function parseNumberList(args: readonly string[]): ValidationResult<number[]> {
  const tokens = splitTokens(args);

  if (tokens.length === 0) {
    return { valid: false, error: 'No values given' };
  }
  if (tokens.length > MAX_VALUES) {
    return { valid: false, error: `Too many values (max ${MAX_VALUES})` };
  }

  const values: number[] = [];
  for (const token of tokens) {
    const value = Number(token);
    if (!Number.isFinite(value)) {
      return { valid: false, error: `Not a number: ${token}` };
    }
    values.push(value);
  }

  return { valid: true, sanitized: values };
}

/**
 * Parse "label=value" pairs; values must be finite and not negative
 */
export function parseLabeledValues(args: readonly string[]): ValidationResult<LabeledValue[]> {
  if (args.length === 0) {
    return { valid: false, error: 'No label=value pairs given' };
  }

  const pairs: LabeledValue[] = [];
  for (const arg of args) {
    const separator = arg.lastIndexOf('=');
    if (separator <= 0) {
      return { valid: false, error: `Expected label=value, got: ${arg}` };
    }

    const label = arg.slice(0, separator).trim();
    const rawValue = arg.slice(separator + 1).trim();
    const value = Number(rawValue);

    if (!label) {
      return { valid: false, error: `Missing label in: ${arg}` };
    }
    if (rawValue === '' || !Number.isFinite(value)) {
      return { valid: false, error: `Not a number: ${rawValue || '(empty)'}` };
    }
    if (value < 0) {
      return { valid: false, error: `Negative values are not supported: ${label}=${rawValue}` };
    }
    pairs.push({ label, value });
  }

  return { valid: true, sanitized: pairs };
}

/**
 * Validate a width/height style integer
 */
export function validateDimension(raw: string | undefined, name: string, min = 1): ValidationResult<number> {
  if (raw === undefined || raw.trim() === '') {
    return { valid: false, error: `Missing value for ${name}` };
  }

  const value = Number(raw);
  if (!Number.isInteger(value)) {
    return { valid: false, error: `${name} must be a whole number` };
  }
  if (value < min || value > MAX_DIMENSION) {
    return { valid: false, error: `${name} must be between ${min} and ${MAX_DIMENSION}` };
  }

  return { valid: true, sanitized: value };
}

/**
 * Check a name against an allowed list, narrowing it to that list's type
 */
export function validateChoice<T extends string>(
  raw: string | undefined,
  allowed: readonly T[],
  name: string
): ValidationResult<T> {
  const match = allowed.find(choice => choice === raw?.trim().toLowerCase());
  if (match === undefined) {
    return { valid: false, error: `Unknown ${name}: ${raw ?? '(none)'} (expected one of ${allowed.join(', ')})` };
  }
  return { valid: true, sanitized: match };
}

/**
 * Split a comma separated table row, trimming each cell
 */
export function parseCsvRow(raw: string): string[] {
  return raw.split(',').map(cell => cell.trim());
}
