import type { ScoreBound, ScoreBoundLiteral, ZElement } from "../ports/z-queue"
import { ValidationError } from "./errors"

export function assertScore(score: number): void {
  if (!Number.isSafeInteger(score)) {
    throw new ValidationError(`Score must be a safe integer, got ${score}`, { score })
  }
}

export function assertDelta(delta: number): void {
  if (!Number.isSafeInteger(delta)) {
    throw new ValidationError(`Delta must be a safe integer, got ${delta}`, { delta })
  }
}

export function assertFinite(delta: number): void {
  if (!Number.isFinite(delta)) {
    throw new ValidationError(`Delta must be finite, got ${delta}`, { delta })
  }
}

export function assertPagination(offset: number, count: number): void {
  if (!Number.isSafeInteger(offset) || offset < 0) {
    throw new ValidationError(`Offset must be a non-negative integer, got ${offset}`, { offset })
  }
  if (!Number.isSafeInteger(count) || count < -1) {
    throw new ValidationError(`Count must be -1 or a non-negative integer, got ${count}`, { count })
  }
}

export function assertPopCount(count: number): void {
  if (!Number.isSafeInteger(count) || count < 0) {
    throw new ValidationError(`Count must be a non-negative integer, got ${count}`, { count })
  }
}

/**
 * Infinite bounds become `-inf`/`+inf`.
 */
export function formatBound(bound: ScoreBound): string {
  if (bound === -Infinity) return "-inf"
  if (bound === Infinity) return "+inf"
  if (Number.isNaN(bound)) {
    throw new ValidationError("Score bound must be a number, got NaN")
  }
  return String(bound)
}

export function formatBoundLiteral(bound: ScoreBoundLiteral): string {
  return typeof bound === "number" ? formatBound(bound) : bound
}

export function members<T>(elements: readonly ZElement<T>[]): T[] {
  return elements.map((element) => element.member)
}
