const PUNCTUATION = /[!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]/g
// Unicode whitespace: adds \x1c-\x1f and \x85 to String#trim's set and leaves out \uFEFF
const EDGE_WHITESPACE = /^[\t\n\v\f\r\x1c-\x20\x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+|[\t\n\v\f\r\x1c-\x20\x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+$/g

/**
 * Canonical comparison form of a food name: lower-case, underscores to spaces,
 * ASCII punctuation removed, trimmed. Inner whitespace is left as is, so
 * "mac & cheese" becomes "mac  cheese".
 */
export function normalize(raw: string | null | undefined): string {
  if (!raw) return ''
  return raw.toLowerCase().replace(/_/g, ' ').replace(PUNCTUATION, '').replace(EDGE_WHITESPACE, '')
}
