/**
 * Parser for sysprop schema documents written in protobuf text format.
 *
 * Decoding is purely structural: the text is tokenized, read into a tree of
 * fields, then mapped onto {@link PropertySet} with defaults for absent
 * fields. Naming and ownership rules are enforced later by the validator.
 *
 * @packageDocumentation
 */

import {
  ACCESS_MODES,
  OWNERS,
  PROPERTY_TYPES,
  SCOPES,
  type Access,
  type Property,
  type PropertySet,
} from './types.js';

/**
 * Error class for schema parsing errors.
 */
export class SchemaParseError extends Error {
  /** 1-based line of the offending token, if known. */
  public readonly line: number | undefined;
  /** 1-based column of the offending token, if known. */
  public readonly column: number | undefined;

  /**
   * Creates a new SchemaParseError.
   *
   * @param message - Descriptive error message.
   * @param position - Location of the offending token.
   */
  constructor(message: string, position?: { line: number; column: number }) {
    super(
      position === undefined
        ? message
        : `${message} (line ${String(position.line)}, column ${String(position.column)})`
    );
    this.name = 'SchemaParseError';
    this.line = position?.line;
    this.column = position?.column;
  }
}

type TokenKind = 'identifier' | 'string' | 'number' | 'punct';

interface Token {
  readonly kind: TokenKind;
  readonly value: string;
  readonly line: number;
  readonly column: number;
}

/** A field read from the document, before it is mapped onto a typed shape. */
interface FieldEntry {
  readonly name: string;
  readonly token: Token;
  readonly value: Token | readonly FieldEntry[];
}

const PUNCTUATION = new Set([':', '{', '}', '<', '>', ',', ';', '[', ']']);

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  t: '\t',
  r: '\r',
  a: '\x07',
  b: '\b',
  f: '\f',
  v: '\v',
  '\\': '\\',
  '"': '"',
  "'": "'",
  '?': '?',
};

const TRUE_LITERALS = new Set(['true', 'True', 't', '1']);
const FALSE_LITERALS = new Set(['false', 'False', 'f', '0']);

const PROPERTY_SET_FIELDS = new Set(['owner', 'module', 'prefix', 'prop']);

const PROPERTY_FIELDS = new Set([
  'name',
  'type',
  'scope',
  'access',
  'readonly',
  'enum_values',
  'legacy_prop_name',
  'deprecated',
  'integer_as_bool',
]);

function isIdentifierStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isIdentifierPart(ch: string): boolean {
  return /[A-Za-z0-9_]/.test(ch);
}

/**
 * Splits schema text into tokens.
 *
 * @param text - Raw schema text.
 * @returns Tokens in source order.
 * @throws SchemaParseError on an unterminated string or an unexpected character.
 */
function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  let line = 1;
  let lineStart = 0;

  const charAt = (index: number): string => text.charAt(index);

  while (pos < text.length) {
    const ch = charAt(pos);
    const column = pos - lineStart + 1;

    if (ch === '\n') {
      pos++;
      line++;
      lineStart = pos;
      continue;
    }

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    if (ch === '#') {
      while (pos < text.length && charAt(pos) !== '\n') {
        pos++;
      }
      continue;
    }

    if (PUNCTUATION.has(ch)) {
      tokens.push({ kind: 'punct', value: ch, line, column });
      pos++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const quote = ch;
      let value = '';
      pos++;
      for (;;) {
        if (pos >= text.length || charAt(pos) === '\n') {
          throw new SchemaParseError('Unterminated string literal', { line, column });
        }
        const current = charAt(pos);
        if (current === quote) {
          pos++;
          break;
        }
        if (current !== '\\') {
          value += current;
          pos++;
          continue;
        }

        const escape = charAt(pos + 1);
        const simple = SIMPLE_ESCAPES[escape];
        if (simple !== undefined) {
          value += simple;
          pos += 2;
        } else if (/[0-7]/.test(escape)) {
          const octal = /^[0-7]{1,3}/.exec(text.slice(pos + 1, pos + 4))?.[0] ?? escape;
          value += String.fromCharCode(parseInt(octal, 8));
          pos += 1 + octal.length;
        } else if (escape === 'x' || escape === 'X') {
          const hex = /^[0-9A-Fa-f]{1,2}/.exec(text.slice(pos + 2, pos + 4))?.[0];
          if (hex === undefined) {
            throw new SchemaParseError('Invalid hex escape in string literal', {
              line,
              column: pos - lineStart + 1,
            });
          }
          value += String.fromCharCode(parseInt(hex, 16));
          pos += 2 + hex.length;
        } else {
          throw new SchemaParseError(`Invalid escape sequence '\\${escape}'`, {
            line,
            column: pos - lineStart + 1,
          });
        }
      }
      tokens.push({ kind: 'string', value, line, column });
      continue;
    }

    if (/[0-9+\-.]/.test(ch)) {
      const match = /^[+-]?[0-9.][0-9A-Za-z_.+-]*/.exec(text.slice(pos));
      const literal = match?.[0] ?? ch;
      tokens.push({ kind: 'number', value: literal, line, column });
      pos += literal.length;
      continue;
    }

    if (isIdentifierStart(ch)) {
      let end = pos + 1;
      while (end < text.length && isIdentifierPart(charAt(end))) {
        end++;
      }
      tokens.push({ kind: 'identifier', value: text.slice(pos, end), line, column });
      pos = end;
      continue;
    }

    throw new SchemaParseError(`Unexpected character '${ch}'`, { line, column });
  }

  return tokens;
}

/**
 * Reads tokens into a tree of fields.
 */
class FieldReader {
  private index = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  /**
   * Reads fields until `closing` (or end of input when `closing` is undefined).
   *
   * @param closing - The closing delimiter and the token that opened the block.
   * @returns The fields read.
   */
  readFields(closing?: { value: string; opener: Token }): FieldEntry[] {
    const fields: FieldEntry[] = [];

    for (;;) {
      const token = this.tokens[this.index];

      if (token === undefined) {
        if (closing !== undefined) {
          throw new SchemaParseError(`Expected '${closing.value}' to close block`, closing.opener);
        }
        return fields;
      }

      if (closing !== undefined && token.kind === 'punct' && token.value === closing.value) {
        this.index++;
        return fields;
      }

      if (token.kind !== 'identifier') {
        throw new SchemaParseError(`Expected field name, got '${token.value}'`, token);
      }
      this.index++;

      for (const value of this.readFieldValues(token)) {
        fields.push({ name: token.value, token, value });
      }

      const separator = this.tokens[this.index];
      if (separator?.kind === 'punct' && (separator.value === ',' || separator.value === ';')) {
        this.index++;
      }
    }
  }

  /**
   * Reads the value after a field name. The list form `name: [a, b]` yields
   * one value per element, as if the field had been repeated.
   */
  private readFieldValues(nameToken: Token): Array<Token | readonly FieldEntry[]> {
    let sawColon = false;
    const next = this.tokens[this.index];

    if (next?.kind === 'punct' && next.value === ':') {
      sawColon = true;
      this.index++;
    }

    const opener = this.tokens[this.index];
    if (opener?.kind === 'punct' && opener.value === '[') {
      this.index++;
      return this.readList(nameToken, opener, sawColon);
    }

    return [this.readValue(nameToken, sawColon)];
  }

  private readList(
    nameToken: Token,
    opener: Token,
    sawColon: boolean
  ): Array<Token | readonly FieldEntry[]> {
    const values: Array<Token | readonly FieldEntry[]> = [];

    const first = this.tokens[this.index];
    if (first?.kind === 'punct' && first.value === ']') {
      this.index++;
      return values;
    }

    for (;;) {
      values.push(this.readValue(nameToken, sawColon));

      const separator = this.tokens[this.index];
      if (separator === undefined) {
        throw new SchemaParseError("Expected ']' to close list", opener);
      }
      this.index++;
      if (separator.kind === 'punct' && separator.value === ']') {
        return values;
      }
      if (separator.kind !== 'punct' || separator.value !== ',') {
        throw new SchemaParseError(`Expected ',' or ']' in list, got '${separator.value}'`, separator);
      }
    }
  }

  private readValue(nameToken: Token, sawColon: boolean): Token | readonly FieldEntry[] {
    const next = this.tokens[this.index];

    if (next === undefined) {
      throw new SchemaParseError(`Missing value for field '${nameToken.value}'`, nameToken);
    }

    if (next.kind === 'punct' && (next.value === '{' || next.value === '<')) {
      this.index++;
      return this.readFields({ value: next.value === '{' ? '}' : '>', opener: next });
    }

    if (!sawColon) {
      throw new SchemaParseError(`Expected ':' after field name '${nameToken.value}'`, next);
    }

    if (next.kind === 'punct') {
      throw new SchemaParseError(
        `Unexpected '${next.value}' as value of field '${nameToken.value}'`,
        next
      );
    }
    this.index++;

    if (next.kind !== 'string') {
      return next;
    }

    // Adjacent string literals concatenate.
    let value = next.value;
    let following = this.tokens[this.index];
    while (following?.kind === 'string') {
      value += following.value;
      this.index++;
      following = this.tokens[this.index];
    }
    return { ...next, value };
  }
}

/**
 * Groups fields by name, rejecting unknown names and repeated singular fields.
 *
 * @param entries - Fields of one message.
 * @param known - Names the message accepts.
 * @param repeated - Names that may appear more than once.
 * @param messagePath - Path of the message for error messages.
 * @returns Singular fields by name and repeated fields in order.
 */
function groupFields(
  entries: readonly FieldEntry[],
  known: ReadonlySet<string>,
  repeated: ReadonlySet<string>,
  messagePath: string
): { singular: Map<string, FieldEntry>; repeated: Map<string, FieldEntry[]> } {
  const singular = new Map<string, FieldEntry>();
  const repeatedFields = new Map<string, FieldEntry[]>();

  for (const entry of entries) {
    const fieldPath = messagePath === '' ? entry.name : `${messagePath}.${entry.name}`;

    if (!known.has(entry.name)) {
      throw new SchemaParseError(`Unknown field '${fieldPath}'`, entry.token);
    }

    if (repeated.has(entry.name)) {
      const list = repeatedFields.get(entry.name) ?? [];
      list.push(entry);
      repeatedFields.set(entry.name, list);
      continue;
    }

    if (singular.has(entry.name)) {
      throw new SchemaParseError(
        `Non-repeated field '${fieldPath}' is specified multiple times`,
        entry.token
      );
    }
    singular.set(entry.name, entry);
  }

  return { singular, repeated: repeatedFields };
}

/**
 * Returns the scalar token of a field, rejecting message values.
 */
function scalarToken(entry: FieldEntry, fieldPath: string): Token {
  const value = entry.value;
  if (!('kind' in value)) {
    throw new SchemaParseError(
      `Invalid type for '${fieldPath}': expected scalar value, got message`,
      entry.token
    );
  }
  return value;
}

/**
 * Validates that a field holds a string literal.
 *
 * @param entry - The field, or undefined when absent.
 * @param fieldPath - Path to the field for error messages.
 * @returns The string, or `""` when absent.
 */
function validateString(entry: FieldEntry | undefined, fieldPath: string): string {
  if (entry === undefined) {
    return '';
  }
  const token = scalarToken(entry, fieldPath);
  if (token.kind !== 'string') {
    throw new SchemaParseError(
      `Invalid type for '${fieldPath}': expected string, got '${token.value}'`,
      token
    );
  }
  return token.value;
}

/**
 * Validates that a field holds a boolean literal.
 *
 * @param entry - The field, or undefined when absent.
 * @param fieldPath - Path to the field for error messages.
 * @returns The boolean, or undefined when absent.
 */
function validateBoolean(entry: FieldEntry | undefined, fieldPath: string): boolean | undefined {
  if (entry === undefined) {
    return undefined;
  }
  const token = scalarToken(entry, fieldPath);
  if (token.kind !== 'string') {
    if (TRUE_LITERALS.has(token.value)) {
      return true;
    }
    if (FALSE_LITERALS.has(token.value)) {
      return false;
    }
  }
  throw new SchemaParseError(
    `Invalid type for '${fieldPath}': expected boolean, got '${token.value}'`,
    token
  );
}

/**
 * Validates that a field names one of an enum's values.
 *
 * @param entry - The field, or undefined when absent.
 * @param allowed - The enum's value names.
 * @param fieldPath - Path to the field for error messages.
 * @returns The matching value, or undefined when absent.
 */
function validateEnum<T extends string>(
  entry: FieldEntry | undefined,
  allowed: readonly T[],
  fieldPath: string
): T | undefined {
  if (entry === undefined) {
    return undefined;
  }
  const token = scalarToken(entry, fieldPath);
  const match = token.kind === 'identifier' ? allowed.find((v) => v === token.value) : undefined;
  if (match === undefined) {
    throw new SchemaParseError(
      `Invalid value for '${fieldPath}': expected one of [${allowed.join(', ')}], got '${token.value}'`,
      token
    );
  }
  return match;
}

/**
 * Maps one `prop` block onto a {@link Property}.
 */
function parseProperty(entry: FieldEntry, index: number): Property {
  const path = `prop[${String(index)}]`;
  const value = entry.value;
  if ('kind' in value) {
    throw new SchemaParseError(
      `Invalid type for '${path}': expected message, got '${value.value}'`,
      value
    );
  }

  const { singular } = groupFields(value, PROPERTY_FIELDS, new Set(), path);
  const field = (name: string): FieldEntry | undefined => singular.get(name);

  const prop: Property = {
    name: validateString(field('name'), `${path}.name`),
    type: validateEnum(field('type'), PROPERTY_TYPES, `${path}.type`) ?? 'Boolean',
    scope: validateEnum(field('scope'), SCOPES, `${path}.scope`) ?? 'Internal',
    enum_values: validateString(field('enum_values'), `${path}.enum_values`),
    legacy_prop_name: validateString(field('legacy_prop_name'), `${path}.legacy_prop_name`),
    deprecated: validateBoolean(field('deprecated'), `${path}.deprecated`) ?? false,
    integer_as_bool: validateBoolean(field('integer_as_bool'), `${path}.integer_as_bool`) ?? false,
  };

  const access: Access | undefined = validateEnum(field('access'), ACCESS_MODES, `${path}.access`);
  if (access !== undefined) {
    prop.access = access;
  }

  const readonly = validateBoolean(field('readonly'), `${path}.readonly`);
  if (readonly !== undefined) {
    prop.readonly = readonly;
  }

  return prop;
}

/**
 * Parses sysprop schema text into a {@link PropertySet}.
 *
 * Absent fields take their defaults: `owner` Platform, strings empty, `type`
 * Boolean, `scope` Internal, flags false. `access` and `readonly` stay unset.
 *
 * @param text - Raw schema text.
 * @returns The decoded property set.
 * @throws SchemaParseError if the text is not a well-formed schema document.
 *
 * @example
 * ```typescript
 * const props = parseSchema(`
 * owner: Vendor
 * module: "vendor.audio.AudioProperties"
 * prop {
 *     name: "volume"
 *     type: Integer
 *     scope: Public
 * }
 * `);
 * props.properties[0]?.type; // 'Integer'
 * ```
 */
export function parseSchema(text: string): PropertySet {
  const entries = new FieldReader(tokenize(text)).readFields();
  const { singular, repeated } = groupFields(entries, PROPERTY_SET_FIELDS, new Set(['prop']), '');

  return {
    owner: validateEnum(singular.get('owner'), OWNERS, 'owner') ?? 'Platform',
    module: validateString(singular.get('module'), 'module'),
    prefix: validateString(singular.get('prefix'), 'prefix'),
    properties: (repeated.get('prop') ?? []).map(parseProperty),
  };
}
