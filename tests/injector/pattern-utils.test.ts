import {
  applyPatternPair,
  compileDetectionPattern,
  escapeRegExp,
  escapeReplacement,
  findRegistration,
  formatTemplate,
} from '../../src/injector/pattern-utils';

describe('pattern-utils', () => {
  describe('escapeRegExp', () => {
    it('should escape characters meaningful to regular expressions', () => {
      expect(escapeRegExp('Laminas\\Router')).toBe('Laminas\\\\Router');
      expect(escapeRegExp('a.b*c+(d)[e]')).toBe('a\\.b\\*c\\+\\(d\\)\\[e\\]');
      expect(escapeRegExp('vendor/package')).toBe('vendor\\/package');
    });

    it('should make escaped names match literally', () => {
      const pattern = new RegExp(escapeRegExp('Foo.Bar'));
      expect(pattern.test('Foo.Bar')).toBe(true);
      expect(pattern.test('FooXBar')).toBe(false);
    });
  });

  describe('escapeReplacement', () => {
    it('should double dollar signs', () => {
      expect(escapeReplacement('Cost$1')).toBe('Cost$$1');
      expect('x'.replace(/x/, escapeReplacement('Cost$1'))).toBe('Cost$1');
    });
  });

  describe('formatTemplate', () => {
    it('should replace every placeholder', () => {
      expect(formatTemplate("'%s' => '%s'", 'Foo')).toBe("'Foo' => 'Foo'");
    });

    it('should leave templates without placeholders untouched', () => {
      expect(formatTemplate('$1\n', 'Foo')).toBe('$1\n');
    });
  });

  describe('compileDetectionPattern', () => {
    it('should drop the global flag so repeated tests are stable', () => {
      const pattern = compileDetectionPattern({ pattern: "'%s'", flags: 'gs' }, 'Foo');
      expect(pattern.flags).toBe('s');
      expect(pattern.test("['Foo']")).toBe(true);
      expect(pattern.test("['Foo']")).toBe(true);
    });
  });

  describe('findRegistration', () => {
    const detection = { pattern: String.raw`return\s+\[[^\]]*'%s'`, flags: 's' };

    it('should return the matched span', () => {
      expect(findRegistration(detection, 'Bar', "return ['Foo', 'Bar'];")).toBe(
        "return ['Foo', 'Bar'"
      );
    });

    it('should return null when the entry is absent', () => {
      expect(findRegistration(detection, 'Baz', "return ['Foo', 'Bar'];")).toBeNull();
    });
  });

  describe('applyPatternPair', () => {
    it('should escape the anchor in the pattern and the value in the replacement', () => {
      const result = applyPatternPair(
        { pattern: "('%s')", replacement: "$1, '%s'" },
        "['A.B', 'AxB']",
        'A.B',
        'New$1'
      );
      expect(result).toBe("['A.B', 'New$1', 'AxB']");
    });

    it('should replace every match', () => {
      const result = applyPatternPair(
        { pattern: String.raw`,(\r?\n){2}`, replacement: ',\n' },
        'a,\n\nb,\n\nc',
        '',
        ''
      );
      expect(result).toBe('a,\nb,\nc');
    });
  });
});
