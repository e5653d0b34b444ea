import { describe, it, expect } from 'vitest'
import { fromNumeric, parseDecimalOrZero, stripFloatNoise, toNumeric } from '../decimal'

describe('decimal.ts', () => {
  describe('parseDecimalOrZero', () => {
    it('should parse plain decimal literals', () => {
      expect(parseDecimalOrZero('500')).toBe(500)
      expect(parseDecimalOrZero(' 12.5 ')).toBe(12.5)
      expect(parseDecimalOrZero('-3')).toBe(-3)
      expect(parseDecimalOrZero('+.5')).toBe(0.5)
      expect(parseDecimalOrZero('1e3')).toBe(1000)
      expect(parseDecimalOrZero('7.')).toBe(7)
    })

    it('should treat formulas and junk as zero', () => {
      expect(parseDecimalOrZero('width * 12')).toBe(0)
      expect(parseDecimalOrZero('12 ft')).toBe(0)
      expect(parseDecimalOrZero('')).toBe(0)
      expect(parseDecimalOrZero('Infinity')).toBe(0)
      expect(parseDecimalOrZero('0x10')).toBe(0)
      expect(parseDecimalOrZero(null)).toBe(0)
      expect(parseDecimalOrZero(undefined)).toBe(0)
    })

    it('should treat overflowing literals as zero', () => {
      expect(parseDecimalOrZero('1e400')).toBe(0)
    })
  })

  describe('stripFloatNoise', () => {
    it('should drop floating-point residue', () => {
      expect(stripFloatNoise(700 * 1.1)).toBe(770)
      expect(stripFloatNoise(0.1 + 0.2)).toBe(0.3)
    })

    it('should keep sub-cent precision', () => {
      expect(stripFloatNoise(100.01 * 1.125)).toBe(112.51125)
      expect(stripFloatNoise(12.345678)).toBe(12.345678)
    })
  })

  describe('numeric columns', () => {
    it('should read and write numeric text', () => {
      expect(fromNumeric('12.50')).toBe(12.5)
      expect(fromNumeric(null)).toBe(0)
      expect(toNumeric(12.5)).toBe('12.5')
    })
  })
})
