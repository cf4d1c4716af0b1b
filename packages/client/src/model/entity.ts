import { z } from "zod"
import { DecodeError } from "./client.errors"

export type Payload = Record<string, unknown>

/**
 * Validate `data` against `schema` or fail with {@link DecodeError}.
 */
export function decodePayload<S extends z.ZodType<Payload>>(schema: S, data: unknown, entity: string): z.output<S> {
  const result = schema.safeParse(data)

  if (!result.success) throw DecodeError.schemaMismatch(entity, result.error)

  return result.data
}

const listSchema = z.array(z.unknown())

/**
 * Decode a JSON array item by item. Fails on the first bad item.
 */
export function decodeList<T>(data: unknown, entity: string, decodeItem: (item: unknown) => T): readonly T[] {
  const result = listSchema.safeParse(data)

  if (!result.success) throw DecodeError.schemaMismatch(entity, result.error)

  return Object.freeze(result.data.map((item) => decodeItem(item)))
}

export function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) return value

  for (const child of Object.values(value)) deepFreeze(child)
  Object.freeze(value)

  return value
}

/**
 * Immutable view over one decoded response object.
 *
 * The payload is kept exactly as received: known fields are exposed through
 * typed accessors, unknown ones through {@link Entity.extras}, and both come
 * back from {@link Entity.toRaw}.
 */
export abstract class Entity<P extends Payload> {
  protected readonly payload: P

  readonly extras: Readonly<Record<string, unknown>>

  protected constructor(payload: P, knownKeys: Readonly<Record<string, unknown>>) {
    this.payload = deepFreeze(payload)
    this.extras = Object.freeze(
      Object.fromEntries(Object.entries(payload).filter(([key]) => !Object.hasOwn(knownKeys, key))),
    )
  }

  /** Deep copy of the decoded response. */
  toRaw(): P {
    return structuredClone(this.payload)
  }
}

/** `null` and absent both read as `undefined`. */
export function opt<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined
}

export function toDate(value: string): Date {
  return new Date(value)
}

export function optDate(value: string | null | undefined): Date | undefined {
  return value === null || value === undefined ? undefined : new Date(value)
}
