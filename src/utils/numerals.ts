/**
 * Turns a price as printed on a page into a number.
 *
 * Pages print prices with locale digits and thousands separators, e.g.
 * `1,234,500`, `۱۲۳٬۴۵۰` or `12 345`. Persian (U+06F0..U+06F9) and
 * Arabic-Indic (U+0660..U+0669) digits are mapped to ASCII, grouping
 * separators are dropped and the Arabic decimal separator `٫` becomes `.`.
 */

const PERSIAN_ZERO = 0x06f0
const ARABIC_INDIC_ZERO = 0x0660

// comma, Arabic thousands separator, Arabic comma, any whitespace, LTR/RTL marks
const GROUPING_CHARS = /[,\u066c\u060c\s\u200e\u200f]/g

const DECIMAL_NUMERAL = /^\d+(\.\d+)?$/

export function toAsciiDigits(text: string): string {
    let out = ''
    for (const ch of text) {
        const code = ch.charCodeAt(0)
        if (code >= PERSIAN_ZERO && code <= PERSIAN_ZERO + 9) {
            out += String(code - PERSIAN_ZERO)
        } else if (code >= ARABIC_INDIC_ZERO && code <= ARABIC_INDIC_ZERO + 9) {
            out += String(code - ARABIC_INDIC_ZERO)
        } else {
            out += ch
        }
    }
    return out
}

export function cleanNumeral(raw: string): string {
    return toAsciiDigits(raw.trim())
        .replace(GROUPING_CHARS, '')
        .replace(/\u066b/g, '.')
}

/**
 * Returns the numeric value of a printed price, or `null` when the text is
 * not an unsigned decimal once cleaned.
 */
export function parseNumeral(raw: string): number | null {
    const cleaned = cleanNumeral(raw)
    if (!DECIMAL_NUMERAL.test(cleaned)) return null
    const value = Number(cleaned)
    return Number.isFinite(value) ? value : null
}
