import {
  ALNUM_ALPHABET,
  ALPHA_ALPHABET,
  CHARACTER_ALPHABET,
  CONTINUOUS,
  alphabetOf,
  alphabetSize,
  isPrintableAlphabet,
  sameSymbols,
  sequenceAlphabet,
} from '../../src/genome/alphabet';

describe('alphabet', () => {
  describe('built-in alphabets', () => {
    it('ALPHA_ALPHABET holds a blank and 52 letters', () => {
      // Assert
      expect(ALPHA_ALPHABET).toHaveLength(53);
      expect(ALPHA_ALPHABET[0]).toBe(' ');
    });

    it('ALNUM_ALPHABET adds the ten digits', () => {
      // Assert
      expect(ALNUM_ALPHABET).toHaveLength(63);
      expect(ALNUM_ALPHABET.slice(-10).join('')).toBe('0123456789');
    });

    it('CHARACTER_ALPHABET adds 32 punctuation characters', () => {
      // Assert
      expect(CHARACTER_ALPHABET).toHaveLength(95);
      expect(new Set(CHARACTER_ALPHABET).size).toBe(95);
    });

    it('are frozen', () => {
      // Assert
      expect(Object.isFrozen(ALPHA_ALPHABET)).toBe(true);
      expect(Object.isFrozen(ALNUM_ALPHABET)).toBe(true);
      expect(Object.isFrozen(CHARACTER_ALPHABET)).toBe(true);
    });

    it('are printable', () => {
      // Assert
      expect(isPrintableAlphabet(CHARACTER_ALPHABET)).toBe(true);
    });
  });

  describe('isPrintableAlphabet', () => {
    it('accepts letters and the blank', () => {
      expect(isPrintableAlphabet(['a', ' ', 'Z'])).toBe(true);
    });
    it('accepts multi-character symbols', () => {
      expect(isPrintableAlphabet(['ab', 'cd'])).toBe(true);
    });
    it('rejects control characters', () => {
      expect(isPrintableAlphabet(['a', '\n'])).toBe(false);
    });
    it('rejects numbers', () => {
      expect(isPrintableAlphabet([0, 1])).toBe(false);
    });
  });

  describe('alphabetSize / alphabetOf', () => {
    it('is infinite for the continuous alphabet', () => {
      // Assert
      expect(alphabetSize({ kind: 'continuous' })).toBe(Infinity);
      expect(alphabetOf({ kind: 'continuous' })).toBe(CONTINUOUS);
    });

    it('counts the symbols of finite alphabets', () => {
      // Arrange
      const symbols = [-1, 0, 1];
      // Assert
      expect(alphabetSize({ kind: 'discrete', symbols })).toBe(3);
      expect(alphabetOf({ kind: 'permutation', symbols })).toBe(symbols);
    });
  });

  describe('sameSymbols', () => {
    it('compares element-wise', () => {
      expect(sameSymbols([0, 1], [0, 1])).toBe(true);
      expect(sameSymbols([0, 1], [1, 0])).toBe(false);
      expect(sameSymbols([0, 1], [0, 1, 2])).toBe(false);
    });
  });

  describe('sequenceAlphabet', () => {
    it('lists 0 .. length-1', () => {
      expect(sequenceAlphabet(4)).toEqual([0, 1, 2, 3]);
    });
  });
});
