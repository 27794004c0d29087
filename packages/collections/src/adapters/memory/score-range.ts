export type ScoreLimit = {
  value: number
  exclusive: boolean
}

const FLOAT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

/**
 * Parses a bound the way the server does: a number, `-inf`, `+inf`, or a
 * number prefixed with `(` for an exclusive bound.
 */
export function parseScoreLimit(raw: string): ScoreLimit {
  const exclusive = raw.startsWith("(")
  const text = exclusive ? raw.slice(1) : raw

  switch (text.toLowerCase()) {
    case "-inf":
      return { value: -Infinity, exclusive }
    case "inf":
    case "+inf":
      return { value: Infinity, exclusive }
  }

  if (!FLOAT.test(text)) throw new Error("ERR min or max is not a float")
  return { value: Number(text), exclusive }
}

export function aboveLimit(score: number, min: ScoreLimit): boolean {
  return min.exclusive ? score > min.value : score >= min.value
}

export function belowLimit(score: number, max: ScoreLimit): boolean {
  return max.exclusive ? score < max.value : score <= max.value
}

/**
 * Member order for equal scores: byte-wise, like `memcmp`.
 */
export function compareMembers(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a), Buffer.from(b))
}
