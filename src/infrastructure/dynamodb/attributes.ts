/**
 * Typed readers for document-client items.
 */

import { InternalError } from "../../shared/errors"
import type { JsonRecord } from "../../shared/types"

export type Item = Record<string, unknown>

function malformed(key: string): InternalError {
  return new InternalError(`Malformed store item: attribute ${key}`)
}

export function readString(item: Item, key: string): string {
  const value = item[key]
  if (typeof value !== "string") {
    throw malformed(key)
  }
  return value
}

export function readOptionalString(item: Item, key: string): string | null {
  const value = item[key]
  if (value === undefined || value === null) {
    return null
  }
  if (typeof value !== "string") {
    throw malformed(key)
  }
  return value
}

export function readNumber(item: Item, key: string): number {
  const value = item[key]
  if (typeof value !== "number") {
    throw malformed(key)
  }
  return value
}

export function readOptionalNumber(item: Item, key: string): number | null {
  const value = item[key]
  if (value === undefined || value === null) {
    return null
  }
  if (typeof value !== "number") {
    throw malformed(key)
  }
  return value
}

export function readBoolean(item: Item, key: string): boolean {
  const value = item[key]
  if (typeof value !== "boolean") {
    throw malformed(key)
  }
  return value
}

export function readOptionalBoolean(item: Item, key: string): boolean | null {
  const value = item[key]
  if (value === undefined || value === null) {
    return null
  }
  if (typeof value !== "boolean") {
    throw malformed(key)
  }
  return value
}

export function readDate(item: Item, key: string): Date {
  return new Date(readString(item, key))
}

export function readOptionalDate(item: Item, key: string): Date | null {
  const value = readOptionalString(item, key)
  return value === null ? null : new Date(value)
}

export function readRecord(item: Item, key: string): JsonRecord {
  const value = item[key]
  if (value === undefined || value === null) {
    return {}
  }
  if (typeof value !== "object" || Array.isArray(value)) {
    throw malformed(key)
  }
  return { ...value }
}

export function readOptionalRecord(item: Item, key: string): JsonRecord | null {
  const value = item[key]
  if (value === undefined || value === null) {
    return null
  }
  return readRecord(item, key)
}

export function readStringArray(item: Item, key: string): string[] {
  const value = item[key]
  if (value === undefined || value === null) {
    return []
  }
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw malformed(key)
  }
  return [...value]
}

export function readItemArray(item: Item, key: string): Item[] {
  const value = item[key]
  if (value === undefined || value === null) {
    return []
  }
  if (!Array.isArray(value)) {
    throw malformed(key)
  }
  return value.map((entry) => {
    if (typeof entry !== "object" || entry === null || Array.isArray(entry)) {
      throw malformed(key)
    }
    return { ...entry }
  })
}

/** Zero-padded so lexical order matches numeric order. */
export function padSequence(sequence: number): string {
  return sequence.toString().padStart(10, "0")
}

export function encodeCursor(key: Item): string {
  return Buffer.from(JSON.stringify(key)).toString("base64url")
}

export function decodeCursor(cursor: string): Item | null {
  try {
    const parsed: unknown = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"))
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      return null
    }
    return { ...parsed }
  } catch {
    return null
  }
}

/** Sorts after any id suffix, for inclusive upper bounds on `<instant>#<id>` keys. */
export const SORT_KEY_MAX = "\uffff"
