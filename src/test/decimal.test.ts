import { describe, it, expect } from 'vitest'
import { Dec } from '../utils/decimal.js'

describe('Dec.roundPrice', () => {
    it('rounds to the four decimals prices are stored with', () => {
        expect(Dec.roundPrice(41250.123456)).toBe(41250.1235)
        expect(Dec.roundPrice(1030000)).toBe(1030000)
    })

    it('rounds half away from zero', () => {
        expect(Dec.roundPrice(0.00005)).toBe(0.0001)
        expect(Dec.roundPrice(-0.00005)).toBe(-0.0001)
    })
})

describe('Dec arithmetic', () => {
    it('adds without 0.1 + 0.2 drift', () => {
        expect(Dec.add(0.1, 0.2)).toBe(0.3)
    })

    it('multiplies quantity by price', () => {
        expect(Dec.mul(3, 0.1)).toBe(0.3)
        expect(Dec.mul(2, 68500000)).toBe(137000000)
    })

    it('divides by a rate and returns 0 for a zero divisor', () => {
        expect(Dec.div(137000000, 1000000)).toBe(137)
        expect(Dec.div(1, 3)).toBe(0.33333333)
        expect(Dec.div(5, 0)).toBe(0)
    })

    it('sums many fractional values', () => {
        expect(Dec.sum(Array.from({ length: 10 }, () => 0.1))).toBe(1)
        expect(Dec.sum([])).toBe(0)
    })

    it('rounds derived amounts to eight decimals', () => {
        expect(Dec.mul(1.123456789, 1)).toBe(1.12345679)
    })
})

