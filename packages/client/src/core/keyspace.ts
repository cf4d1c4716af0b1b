import { type CacheNamespace, createNamespace, type KeyPart } from "@loungekit/cache"

/** One cache per entity type, each with its own key namespace. */
export const keyspace = {
  player: createNamespace("player"),
  playerDetails: createNamespace("playerDetails"),
  playerList: createNamespace("playerList"),
  leaderboard: createNamespace("leaderboard"),
  table: createNamespace("table"),
  tableList: createNamespace("tableList"),
  unverifiedTables: createNamespace("unverifiedTables"),
  bonus: createNamespace("bonus"),
  bonusList: createNamespace("bonusList"),
  penalty: createNamespace("penalty"),
  penaltyList: createNamespace("penaltyList"),
} as const satisfies Record<string, CacheNamespace>

export type EntityType = keyof typeof keyspace

export function isEntityType(value: string): value is EntityType {
  return Object.hasOwn(keyspace, value)
}

const CASE_INSENSITIVE: ReadonlySet<string> = new Set(["name", "search"])

/**
 * `name=value`. Player names are matched case-insensitively by the service,
 * so they are keyed lower-cased.
 */
export function part(name: string, value: string | number | boolean): KeyPart {
  const text = String(value)

  return `${name}=${CASE_INSENSITIVE.has(name) ? text.toLowerCase() : text}`
}

/** Key parts for a query without qualifiers. */
export const ALL: readonly KeyPart[] = ["all"]
