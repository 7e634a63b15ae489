import { firstOf, readPath, readText, toText } from './read-path';
import { formatListLiteral } from './list-literal';

describe('readPath', () => {
  const resource = {
    name: [{ given: ['Ann'] }],
    meta: { lastUpdated: '2024-03-01' },
  };

  it('should follow keys and indexes', () => {
    expect(readPath(resource, ['name', 0, 'given', 0])).toBe('Ann');
    expect(readPath(resource, ['meta', 'lastUpdated'])).toBe('2024-03-01');
  });

  it('should return undefined when a step has the wrong shape', () => {
    expect(readPath(resource, ['meta', 0])).toBeUndefined();
    expect(readPath(resource, ['name', 'given'])).toBeUndefined();
    expect(readPath(resource, ['name', 3, 'given'])).toBeUndefined();
    expect(readPath(null, ['name'])).toBeUndefined();
  });

  it('should read text with an empty default', () => {
    expect(readText(resource, ['meta', 'lastUpdated'])).toBe('2024-03-01');
    expect(readText(resource, ['meta', 'missing'])).toBe('');
    expect(readText(resource, ['meta'])).toBe('');
  });
});

describe('toText', () => {
  it('should render scalars and empty out everything else', () => {
    expect(toText('a')).toBe('a');
    expect(toText(12.5)).toBe('12.5');
    expect(toText(true)).toBe('True');
    expect(toText(NaN)).toBe('');
    expect(toText(null)).toBe('');
    expect(toText(['a'])).toBe('');
  });
});

describe('firstOf', () => {
  it('should unwrap lists only', () => {
    expect(firstOf(['a', 'b'])).toBe('a');
    expect(firstOf('a')).toBe('a');
    expect(firstOf([])).toBeUndefined();
  });
});

describe('formatListLiteral', () => {
  it('should quote strings with single quotes by default', () => {
    expect(formatListLiteral(['Lee'])).toBe("['Lee']");
    expect(formatListLiteral(['van', 'Dyke'])).toBe("['van', 'Dyke']");
    expect(formatListLiteral([])).toBe('[]');
  });

  it('should switch to double quotes for values with an apostrophe', () => {
    expect(formatListLiteral(["O'Neil"])).toBe(`["O'Neil"]`);
    expect(formatListLiteral([`O'Neil "Jr"`])).toBe(`['O\\'Neil "Jr"']`);
  });

  it('should escape backslashes and line breaks', () => {
    expect(formatListLiteral(['a\\b\nc'])).toBe("['a\\\\b\\nc']");
  });

  it('should hex-escape other non-printable characters', () => {
    expect(formatListLiteral(['a\u0007'])).toBe("['a\\x07']");
    expect(formatListLiteral(['\u00a0x\u007f'])).toBe("['\\xa0x\\x7f']");
    expect(formatListLiteral(['line\u2028sep'])).toBe("['line\\u2028sep']");
  });

  it('should keep printable non-ASCII characters and spaces as they are', () => {
    expect(formatListLiteral(['Zoë Ng'])).toBe("['Zoë Ng']");
  });

  it('should render non-string members', () => {
    expect(formatListLiteral([1, true, null, ['x'], { a: 'b' }])).toBe(
      "[1, True, None, ['x'], {'a': 'b'}]",
    );
  });
});
