/**
 * Ratcliff-Obershelp similarity ("gestalt pattern matching").
 *
 * The longest common contiguous run is taken first, then the algorithm recurses
 * on the pieces left and right of it. ratio = 2 * matched / (len(a) + len(b)).
 * Lengths are in code points, not UTF-16 units.
 */

const AUTOJUNK_MIN_LENGTH = 200

interface Block {
  i: number
  j: number
  size: number
}

/** Positions of each element of `b`. Popular elements of long sequences are left out. */
function indexSequence(b: string[]): Map<string, number[]> {
  const b2j = new Map<string, number[]>()
  b.forEach((elt, j) => {
    const idxs = b2j.get(elt)
    if (idxs) idxs.push(j)
    else b2j.set(elt, [j])
  })
  if (b.length >= AUTOJUNK_MIN_LENGTH) {
    const ntest = Math.floor(b.length / 100) + 1
    for (const [elt, idxs] of b2j) {
      if (idxs.length > ntest) b2j.delete(elt)
    }
  }
  return b2j
}

/** Longest matching run in a[alo:ahi] / b[blo:bhi]; earliest in a, then in b, on ties. */
function longestMatch(
  a: string[],
  b: string[],
  b2j: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): Block {
  let besti = alo
  let bestj = blo
  let bestsize = 0
  let j2len = new Map<number, number>()
  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>()
    for (const j of b2j.get(a[i]) ?? []) {
      if (j < blo) continue
      if (j >= bhi) break
      const k = (j2len.get(j - 1) ?? 0) + 1
      next.set(j, k)
      if (k > bestsize) {
        besti = i - k + 1
        bestj = j - k + 1
        bestsize = k
      }
    }
    j2len = next
  }
  // popular elements never seed a match but may still extend one
  while (besti > alo && bestj > blo && a[besti - 1] === b[bestj - 1]) {
    besti--
    bestj--
    bestsize++
  }
  while (besti + bestsize < ahi && bestj + bestsize < bhi && a[besti + bestsize] === b[bestj + bestsize]) {
    bestsize++
  }
  return { i: besti, j: bestj, size: bestsize }
}

function matchingBlocks(a: string[], b: string[]): Block[] {
  const b2j = indexSequence(b)
  const blocks: Block[] = []
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]]
  while (queue.length) {
    const next = queue.pop()
    if (!next) break
    const [alo, ahi, blo, bhi] = next
    const m = longestMatch(a, b, b2j, alo, ahi, blo, bhi)
    if (m.size === 0) continue
    blocks.push(m)
    if (alo < m.i && blo < m.j) queue.push([alo, m.i, blo, m.j])
    if (m.i + m.size < ahi && m.j + m.size < bhi) queue.push([m.i + m.size, ahi, m.j + m.size, bhi])
  }
  return blocks.sort((x, y) => x.i - y.i || x.j - y.j)
}

function ratioOf(matched: number, total: number): number {
  return total ? (2 * matched) / total : 1
}

/**
 * Similarity of `a` to `b` in [0, 1]. Not symmetric in every case: runs are
 * searched from the first argument into the second.
 */
export function similarityRatio(a: string, b: string): number {
  const sa = Array.from(a)
  const sb = Array.from(b)
  const matched = matchingBlocks(sa, sb).reduce((s, m) => s + m.size, 0)
  return ratioOf(matched, sa.length + sb.length)
}

/** Upper bound on similarityRatio from shared characters, ignoring order. */
export function quickRatio(a: string, b: string): number {
  const sa = Array.from(a)
  const sb = Array.from(b)
  const avail = new Map<string, number>()
  for (const ch of sb) avail.set(ch, (avail.get(ch) ?? 0) + 1)
  let matched = 0
  for (const ch of sa) {
    const n = avail.get(ch) ?? 0
    if (n > 0) {
      avail.set(ch, n - 1)
      matched++
    }
  }
  return ratioOf(matched, sa.length + sb.length)
}

export interface CloseMatch {
  candidate: string
  index: number
  score: number
}

/**
 * Candidates scoring at least `cutoff` against `word`, best first, at most `n`.
 * Equal scores keep candidate order.
 */
export function closeMatches(word: string, candidates: readonly string[], n = 3, cutoff = 0.6): CloseMatch[] {
  if (!(n > 0)) throw new RangeError(`n must be > 0: ${n}`)
  if (!(cutoff >= 0 && cutoff <= 1)) throw new RangeError(`cutoff must be in [0, 1]: ${cutoff}`)
  const hits: CloseMatch[] = []
  candidates.forEach((candidate, index) => {
    if (quickRatio(candidate, word) < cutoff) return
    const score = similarityRatio(candidate, word)
    if (score >= cutoff) hits.push({ candidate, index, score })
  })
  return hits.sort((x, y) => y.score - x.score || x.index - y.index).slice(0, n)
}
