import { InvalidValueError } from '../errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ValueKind = 'string' | 'integer' | 'float' | 'boolean';

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

export interface IntegerValue {
  readonly kind: 'integer';
  readonly value: number;
}

export interface FloatValue {
  readonly kind: 'float';
  readonly value: number;
}

export interface BooleanValue {
  readonly kind: 'boolean';
  readonly value: boolean;
}

/** A scalar stored under a dotted key. */
export type ValueType = StringValue | IntegerValue | FloatValue | BooleanValue;

/** Anything `set` accepts: a tagged value or a plain primitive. */
export type ValueInput = ValueType | string | number | boolean;

export const VALUE_KINDS: readonly ValueKind[] = ['string', 'integer', 'float', 'boolean'];

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

// ---------------------------------------------------------------------------
// Value namespace (constructors + conversion)
// ---------------------------------------------------------------------------

export const Value = {
  /** @throws {InvalidValueError} when `value` holds an unpaired surrogate */
  string(value: string): StringValue {
    if (LONE_SURROGATE.test(value)) {
      throw new InvalidValueError('String value contains an unpaired UTF-16 surrogate');
    }
    return { kind: 'string', value };
  },

  /** @throws {InvalidValueError} unless `value` is a safe integer */
  integer(value: number): IntegerValue {
    if (!Number.isSafeInteger(value)) {
      throw new InvalidValueError(`Integer value must be a safe integer, got ${value}`);
    }
    return { kind: 'integer', value };
  },

  /** @throws {InvalidValueError} unless `value` is finite */
  float(value: number): FloatValue {
    if (!Number.isFinite(value)) {
      throw new InvalidValueError(`Float value must be finite, got ${value}`);
    }
    return { kind: 'float', value };
  },

  boolean(value: boolean): BooleanValue {
    return { kind: 'boolean', value };
  },

  /**
   * Normalize `set` input. Integral numbers in the safe range become
   * integers, other numbers floats; use `Value.float(1)` to store an
   * integral float. Tagged input is checked against its kind.
   */
  from(input: ValueInput): ValueType {
    switch (typeof input) {
      case 'string':
        return Value.string(input);
      case 'boolean':
        return Value.boolean(input);
      case 'number':
        return Number.isSafeInteger(input) ? Value.integer(input) : Value.float(input);
      default:
        return Value.checked(input);
    }
  },

  /**
   * Parse user-supplied text as the given kind.
   *
   * @throws {InvalidValueError} when the text is not a valid literal of that kind.
   */
  parseAs(kind: ValueKind, text: string): ValueType {
    switch (kind) {
      case 'string':
        return Value.string(text);
      case 'integer': {
        const trimmed = text.trim();
        if (!/^[+-]?\d+$/.test(trimmed)) {
          throw new InvalidValueError(`Not an integer: '${text}'`);
        }
        return Value.integer(Number(trimmed));
      }
      case 'float': {
        const trimmed = text.trim();
        const num = Number(trimmed);
        if (trimmed.length === 0 || Number.isNaN(num)) {
          throw new InvalidValueError(`Not a number: '${text}'`);
        }
        return Value.float(num);
      }
      case 'boolean': {
        const lowered = text.trim().toLowerCase();
        if (lowered === 'true') return Value.boolean(true);
        if (lowered === 'false') return Value.boolean(false);
        throw new InvalidValueError(`Not a boolean (expected true or false): '${text}'`);
      }
    }
  },

  /** Copy of `value` run back through its kind's constructor. */
  checked(value: ValueType): ValueType {
    switch (value.kind) {
      case 'string':
        return Value.string(value.value);
      case 'integer':
        return Value.integer(value.value);
      case 'float':
        return Value.float(value.value);
      case 'boolean':
        return Value.boolean(value.value);
    }
  },

  copy(value: ValueType): ValueType {
    return { ...value };
  },

  equals(a: ValueType, b: ValueType): boolean {
    return a.kind === b.kind && a.value === b.value;
  },

  /** The bare JS value, for callers that do not care about the kind. */
  toPrimitive(value: ValueType): string | number | boolean {
    return value.value;
  },

  /**
   * Human-readable text: strings verbatim, everything else in its TOML
   * literal form (so integral floats keep their `.0`).
   */
  display(value: ValueType): string {
    return value.kind === 'string' ? value.value : formatScalarLiteral(value);
  },
};

/** TOML literal text for non-string values. */
export function formatScalarLiteral(value: IntegerValue | FloatValue | BooleanValue): string {
  switch (value.kind) {
    case 'integer':
      return String(value.value);
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'float': {
      const text = String(value.value);
      // 1e+21, 0.5 and 1e-7 are already float literals; 3 needs a fraction.
      return /[.eE]/.test(text) ? text : `${text}.0`;
    }
  }
}
