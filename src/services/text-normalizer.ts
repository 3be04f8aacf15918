/**
 * Text Normalizer
 * Converts display text (markdown from the assistant) into speakable text
 */

import numberToWords from 'number-to-words';
const { toWords, toWordsOrdinal } = numberToWords;

const BOLD = /\*\*([^*]+)\*\*/g;
const ITALIC = /\*([^*]+)\*/g;
const CODE_BLOCK = /```[^`]*```/g;
const INLINE_CODE = /`([^`]+)`/g;
const HEADERS = /^#{1,6}\s+/gm;
const LINKS = /\[([^\]]+)\]\([^)]+\)/g;
const SPECIAL_CHARS = /[_~[\]{}]/g;
// Markers left over when a chunk boundary splits a markdown pair
const STRAY_MARKERS = /[*`]/g;
const WHITESPACE = /\s+/g;

export interface TextNormalizerOptions {
  /** Spell out numbers, currency, percentages and symbols */
  spellNumbers?: boolean;
}

export class TextNormalizer {
  private spellNumbers: boolean;

  constructor(options: TextNormalizerOptions = {}) {
    this.spellNumbers = options.spellNumbers ?? false;
  }

  /**
   * Produce the text handed to the synthesizer.
   * Returns an empty string when nothing speakable is left.
   */
  normalize(text: string): string {
    const cleaned = this.cleanMarkdown(text);
    if (!this.spellNumbers || !cleaned) return cleaned;

    try {
      return this.spellOut(cleaned);
    } catch {
      // Spoken as written
      return cleaned;
    }
  }

  /** Strip markdown meant for visual display */
  cleanMarkdown(text: string): string {
    return text
      .replace(BOLD, '$1')
      .replace(ITALIC, '$1')
      .replace(CODE_BLOCK, '')
      .replace(INLINE_CODE, '$1')
      .replace(HEADERS, '')
      .replace(LINKS, '$1')
      .replace(SPECIAL_CHARS, '')
      .replace(STRAY_MARKERS, '')
      .replace(WHITESPACE, ' ')
      .trim();
  }

  private spellOut(text: string): string {
    let result = text;
    result = this.normalizeTimes(result);
    result = this.normalizeCurrency(result);
    result = this.normalizeDecimalNumbers(result);
    result = this.normalizeOrdinals(result);
    result = this.normalizePercentages(result);
    result = this.normalizeStandaloneNumbers(result);
    result = this.normalizeSymbols(result);
    return result.replace(WHITESPACE, ' ').trim();
  }

  /** Digits beyond the safe integer range stay as digits */
  private cardinal(digits: string): string {
    const value = parseInt(digits, 10);
    return Number.isSafeInteger(value) ? toWords(value) : digits;
  }

  private ordinal(digits: string, suffix: string): string {
    const value = parseInt(digits, 10);
    return Number.isSafeInteger(value) ? toWordsOrdinal(value) : `${digits}${suffix}`;
  }

  private normalizeTimes(text: string): string {
    return text.replace(
      /\b(\d{1,2}):(\d{2})\s*(AM|PM|am|pm)?\b/g,
      (_, hourStr: string, minuteStr: string, period: string | undefined) => {
        const hour = parseInt(hourStr, 10);
        const minute = parseInt(minuteStr, 10);
        const minuteWord = minute === 0 ? '' : minute < 10 ? 'oh ' + toWords(minute) : toWords(minute);
        const periodWord = period ? ' ' + period.toUpperCase().split('').join(' ') : '';
        return `${toWords(hour)} ${minuteWord}${periodWord}`.replace(WHITESPACE, ' ').trim();
      }
    );
  }

  private normalizeCurrency(text: string): string {
    const result = text.replace(/\$(\d+)\.(\d{2})\b/g, (_, dollars: string, cents: string) => {
      const d = parseInt(dollars, 10);
      const c = parseInt(cents, 10);
      let phrase = this.cardinal(dollars) + (d === 1 ? ' dollar' : ' dollars');
      if (c > 0) phrase += ' and ' + toWords(c) + (c === 1 ? ' cent' : ' cents');
      return phrase;
    });
    return result.replace(/\$(\d+)\b/g, (_, dollars: string) => {
      const d = parseInt(dollars, 10);
      return this.cardinal(dollars) + (d === 1 ? ' dollar' : ' dollars');
    });
  }

  private normalizeDecimalNumbers(text: string): string {
    return text.replace(/(\d+)\.(\d+)/g, (_, whole: string, decimal: string) => {
      const digits = decimal.split('').map((d) => toWords(parseInt(d, 10))).join(' ');
      return `${this.cardinal(whole)} point ${digits}`;
    });
  }

  private normalizeOrdinals(text: string): string {
    return text.replace(/\b(\d+)(st|nd|rd|th)\b/gi, (_, num: string, suffix: string) => this.ordinal(num, suffix));
  }

  private normalizePercentages(text: string): string {
    return text.replace(/(\d+)%/g, (_, num: string) => this.cardinal(num) + ' percent');
  }

  private normalizeStandaloneNumbers(text: string): string {
    return text.replace(/\b(\d+)\b/g, (match) => this.cardinal(match));
  }

  private normalizeSymbols(text: string): string {
    return text
      .replace(/&/g, ' and ')
      .replace(/@/g, ' at ')
      .replace(/\+/g, ' plus ')
      .replace(/=/g, ' equals ');
  }
}
