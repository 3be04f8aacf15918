import { describe, it, expect } from 'vitest';
import { TextNormalizer } from '../src/services/text-normalizer';

describe('TextNormalizer', () => {
  const normalizer = new TextNormalizer();

  describe('cleanMarkdown', () => {
    it('removes emphasis, inline code and headers', () => {
      expect(normalizer.cleanMarkdown('# Title\nSome **bold** and *italic* with `code`'))
        .toBe('Title Some bold and italic with code');
    });

    it('keeps link text and drops the target', () => {
      expect(normalizer.cleanMarkdown('See [the docs](https://example.com/docs) now')).toBe('See the docs now');
    });

    it('drops fenced code blocks entirely', () => {
      expect(normalizer.cleanMarkdown('Run ```npm install``` first')).toBe('Run first');
    });

    it('removes display-only characters', () => {
      expect(normalizer.cleanMarkdown('snake_case ~tilde~ {x} [y]')).toBe('snakecase tilde x y');
    });

    it('removes markers split across chunk boundaries', () => {
      expect(normalizer.cleanMarkdown('**Hel')).toBe('Hel');
      expect(normalizer.cleanMarkdown('lo** there')).toBe('lo there');
    });

    it('returns an empty string for whitespace', () => {
      expect(normalizer.cleanMarkdown('  \n\t ')).toBe('');
    });
  });

  describe('normalize', () => {
    it('only cleans markdown by default', () => {
      expect(normalizer.normalize('**3** items')).toBe('3 items');
    });

    it('spells out numbers when enabled', () => {
      const speaking = new TextNormalizer({ spellNumbers: true });

      expect(speaking.normalize('50% of 3 items')).toBe('fifty percent of three items');
      expect(speaking.normalize('Meet at 3:05 PM')).toBe('Meet at three oh five P M');
      expect(speaking.normalize('the 21st floor')).toBe('the twenty-first floor');
      expect(speaking.normalize('$2.50 total')).toBe('two dollars and fifty cents total');
      expect(speaking.normalize('A & B')).toBe('A and B');
    });

    it('keeps numbers too large to spell as digits', () => {
      const speaking = new TextNormalizer({ spellNumbers: true });

      expect(speaking.normalize('Order 12345678901234567890 shipped')).toBe('Order 12345678901234567890 shipped');
      expect(speaking.normalize('the 99999999999999999th try')).toBe('the 99999999999999999th try');
      expect(speaking.normalize('$12345678901234567890 and 2 more')).toBe('12345678901234567890 dollars and two more');
    });
  });
});
