const ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

// Control, format, private-use, unassigned and separator characters other than space
const NON_PRINTABLE = /^[\p{Cc}\p{Cf}\p{Cs}\p{Co}\p{Cn}\p{Zl}\p{Zp}\p{Zs}]$/u;

function hexEscape(char: string): string {
  const code = char.codePointAt(0) ?? 0;
  if (code <= 0xff) {
    return `\\x${code.toString(16).padStart(2, '0')}`;
  }
  if (code <= 0xffff) {
    return `\\u${code.toString(16).padStart(4, '0')}`;
  }
  return `\\U${code.toString(16).padStart(8, '0')}`;
}

function quoteString(value: string): string {
  const quote = value.includes("'") && !value.includes('"') ? '"' : "'";
  let quoted = quote;
  for (const char of value) {
    if (char === quote) {
      quoted += `\\${char}`;
    } else if (ESCAPES[char] !== undefined) {
      quoted += ESCAPES[char];
    } else if (char !== ' ' && NON_PRINTABLE.test(char)) {
      quoted += hexEscape(char);
    } else {
      quoted += char;
    }
  }
  return quoted + quote;
}

function formatValue(value: unknown): string {
  if (Array.isArray(value)) {
    return formatListLiteral(value);
  }
  switch (typeof value) {
    case 'string':
      return quoteString(value);
    case 'number':
      return String(value);
    case 'boolean':
      return value ? 'True' : 'False';
    case 'object':
      if (value === null) {
        return 'None';
      }
      return `{${Object.entries(value)
        .map(([key, entry]) => `${quoteString(key)}: ${formatValue(entry)}`)
        .join(', ')}}`;
    default:
      return 'None';
  }
}

/**
 * Render a list the way earlier extracts printed list-valued cells,
 * e.g. `['Lee']` or `['Lee', "O'Neil"]`.
 *
 * Strings match earlier extracts byte for byte. Numbers do not always:
 * JSON parsing drops the distinction between `1.0` and `1`, so an
 * integral float renders as `1`.
 */
export function formatListLiteral(values: readonly unknown[]): string {
  return `[${values.map((value) => formatValue(value)).join(', ')}]`;
}
