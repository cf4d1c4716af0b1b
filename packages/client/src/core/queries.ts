import type { CacheKey, KeyPart } from "@loungekit/cache"
import { z } from "zod"
import { InvalidArgumentError } from "../model/client.errors"
import type { QueryValue } from "../ports/transport"
import { ALL, type EntityType, keyspace, part } from "./keyspace"

type ExactlyOne<T> = {
  [K in keyof T]: Required<Pick<T, K>> & { [O in Exclude<keyof T, K>]?: never }
}[keyof T]

export type PlayerIdentifier = ExactlyOne<{
  id: number
  name: string
  mkcId: number
  discordId: string
  /** Switch friend code, `dddd-dddd-dddd`. */
  fc: string
}>

export type PlayerLookup = PlayerIdentifier & { season?: number }

export type PlayerDetailsLookup = ExactlyOne<{ id: number; name: string }> & { season?: number }

export type PlayerListQuery = { minMmr?: number; maxMmr?: number; season?: number }

/** Finds a player on the leaderboard by an external identity. */
export type LeaderboardSearch = ExactlyOne<{ mkcId: number; discordId: string; fc: string }>

export type LeaderboardQuery = {
  season: number
  /** @default 0 */
  skip?: number
  /** @default 50 */
  pageSize?: number
  /** A name fragment or an external identity. */
  search?: string | LeaderboardSearch
  /** ISO 3166 alpha-2. */
  country?: string
  minMmr?: number
  maxMmr?: number
  minEventsPlayed?: number
  maxEventsPlayed?: number
}

export type TableListQuery = { from?: Date; to?: Date; season?: number }

export type SeasonQuery = { season?: number }

export type BonusListQuery = { name: string; season?: number }

export type PenaltyListQuery = {
  name: string
  isStrike?: boolean
  from?: Date
  /** @default false */
  includeDeleted?: boolean
  season?: number
}

/** What to fetch and where to cache it. */
export type LoungeRequest<E extends EntityType = EntityType> = Readonly<{
  entity: E
  path: string
  params: Readonly<Record<string, QueryValue>>
  key: CacheKey
}>

export const DEFAULT_PAGE_SIZE = 50

const id = z.number().int().positive()
const count = z.number().int().nonnegative()
const season = count.optional()
const name = z.string().trim().min(1, { error: "must not be empty" })
const fc = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{4}-\d{4}$/, { error: "must look like 1234-5678-9012" })
const discordId = z
  .string()
  .trim()
  .regex(/^\d+$/, { error: "must be a numeric id" })
const date = z.date()
const country = z
  .string()
  .trim()
  .regex(/^[a-z]{2}$/i, { error: "must be a two-letter country code" })
  .transform((code) => code.toUpperCase())

const playerIdentifierFields = ["id", "name", "mkcId", "discordId", "fc"] as const

function exactlyOne(fields: readonly string[]) {
  return (value: Record<string, unknown>) => fields.filter((field) => value[field] !== undefined).length === 1
}

function ordered(min: number | undefined, max: number | undefined): boolean {
  return min === undefined || max === undefined || min <= max
}

const playerLookupSchema = z
  .strictObject({
    id: id.optional(),
    name: name.optional(),
    mkcId: id.optional(),
    discordId: discordId.optional(),
    fc: fc.optional(),
    season,
  })
  .refine(exactlyOne(playerIdentifierFields), {
    error: `exactly one of ${playerIdentifierFields.join(", ")} is required`,
  })

const playerDetailsLookupSchema = z
  .strictObject({ id: id.optional(), name: name.optional(), season })
  .refine(exactlyOne(["id", "name"]), { error: "exactly one of id, name is required" })

const playerListQuerySchema = z
  .strictObject({ minMmr: count.optional(), maxMmr: count.optional(), season })
  .refine((q) => ordered(q.minMmr, q.maxMmr), { error: "minMmr must not exceed maxMmr" })

const leaderboardSearchSchema = z
  .strictObject({ mkcId: id.optional(), discordId: discordId.optional(), fc: fc.optional() })
  .refine(exactlyOne(["mkcId", "discordId", "fc"]), {
    error: "exactly one of mkcId, discordId, fc is required",
  })

const leaderboardQuerySchema = z
  .strictObject({
    season: count,
    skip: count.default(0),
    pageSize: id.default(DEFAULT_PAGE_SIZE),
    search: z.union([name, leaderboardSearchSchema]).optional(),
    country: country.optional(),
    minMmr: count.optional(),
    maxMmr: count.optional(),
    minEventsPlayed: count.optional(),
    maxEventsPlayed: count.optional(),
  })
  .refine((q) => ordered(q.minMmr, q.maxMmr), { error: "minMmr must not exceed maxMmr" })
  .refine((q) => ordered(q.minEventsPlayed, q.maxEventsPlayed), {
    error: "minEventsPlayed must not exceed maxEventsPlayed",
  })

const tableListQuerySchema = z
  .strictObject({ from: date.optional(), to: date.optional(), season })
  .refine((q) => ordered(q.from?.getTime(), q.to?.getTime()), { error: "from must not be after to" })

const seasonQuerySchema = z.strictObject({ season })

const bonusListQuerySchema = z.strictObject({ name, season })

const penaltyListQuerySchema = z.strictObject({
  name,
  isStrike: z.boolean().optional(),
  from: date.optional(),
  includeDeleted: z.boolean().default(false),
  season,
})

/**
 * Validate caller input, failing with {@link InvalidArgumentError} on the
 * first issue. Runs before any I/O.
 */
function parseArgs<S extends z.ZodType>(schema: S, input: unknown, argument: string): z.output<S> {
  const result = schema.safeParse(input)

  if (result.success) return result.data

  const issue = result.error.issues[0]
  const path = issue?.path.map(String).join(".") ?? ""

  throw InvalidArgumentError.because(
    path === "" ? argument : `${argument}.${path}`,
    issue?.message ?? "invalid value",
    input,
  )
}

type Entry = readonly [string, QueryValue | undefined]

function request<E extends EntityType>(entity: E, path: string, entries: readonly Entry[]): LoungeRequest<E> {
  const params: Record<string, QueryValue> = {}
  const parts: KeyPart[] = []

  for (const [field, value] of entries) {
    if (value === undefined) continue

    params[field] = value
    parts.push(part(field, value))
  }

  return {
    entity,
    path,
    params,
    key: keyspace[entity].key(...(parts.length === 0 ? ALL : parts)),
  }
}

function identifier(lookup: Readonly<Record<string, string | number | undefined>>, fields: readonly string[]): Entry {
  const field = fields.find((f) => lookup[f] !== undefined) ?? fields[0] ?? ""

  return [field, lookup[field]]
}

export function playerRequest(lookup: PlayerLookup): LoungeRequest<"player"> {
  const q = parseArgs(playerLookupSchema, lookup, "lookup")

  return request("player", "player", [identifier(q, playerIdentifierFields), ["season", q.season]])
}

export function playerDetailsRequest(lookup: PlayerDetailsLookup): LoungeRequest<"playerDetails"> {
  const q = parseArgs(playerDetailsLookupSchema, lookup, "lookup")

  return request("playerDetails", "player/details", [identifier(q, ["id", "name"]), ["season", q.season]])
}

export function playerListRequest(query: PlayerListQuery = {}): LoungeRequest<"playerList"> {
  const q = parseArgs(playerListQuerySchema, query, "query")

  return request("playerList", "player/list", [
    ["minMmr", q.minMmr],
    ["maxMmr", q.maxMmr],
    ["season", q.season],
  ])
}

type SearchFields = Readonly<{ mkcId?: number | undefined; discordId?: string | undefined; fc?: string | undefined }>

/** `mkc=<id>`, `discord=<id>` or `switch=<fc>`; a name fragment as is. */
export function formatLeaderboardSearch(search: string | SearchFields): string {
  if (typeof search === "string") return search
  if (search.mkcId !== undefined) return `mkc=${search.mkcId}`
  if (search.discordId !== undefined) return `discord=${search.discordId}`

  return `switch=${search.fc ?? ""}`
}

export function leaderboardRequest(query: LeaderboardQuery): LoungeRequest<"leaderboard"> {
  const q = parseArgs(leaderboardQuerySchema, query, "query")

  return request("leaderboard", "player/leaderboard", [
    ["season", q.season],
    ["skip", q.skip],
    ["pageSize", q.pageSize],
    ["search", q.search === undefined ? undefined : formatLeaderboardSearch(q.search)],
    ["country", q.country],
    ["minMmr", q.minMmr],
    ["maxMmr", q.maxMmr],
    ["minEventsPlayed", q.minEventsPlayed],
    ["maxEventsPlayed", q.maxEventsPlayed],
  ])
}

export function tableRequest(tableId: number): LoungeRequest<"table"> {
  return request("table", "table", [["tableId", parseArgs(id, tableId, "tableId")]])
}

export function tableListRequest(query: TableListQuery = {}): LoungeRequest<"tableList"> {
  const q = parseArgs(tableListQuerySchema, query, "query")

  return request("tableList", "table/list", [
    ["from", q.from?.toISOString()],
    ["to", q.to?.toISOString()],
    ["season", q.season],
  ])
}

export function unverifiedTablesRequest(query: SeasonQuery = {}): LoungeRequest<"unverifiedTables"> {
  const q = parseArgs(seasonQuerySchema, query, "query")

  return request("unverifiedTables", "table/unverified", [["season", q.season]])
}

export function bonusRequest(bonusId: number): LoungeRequest<"bonus"> {
  return request("bonus", "bonus", [["id", parseArgs(id, bonusId, "id")]])
}

export function bonusListRequest(query: BonusListQuery): LoungeRequest<"bonusList"> {
  const q = parseArgs(bonusListQuerySchema, query, "query")

  return request("bonusList", "bonus/list", [
    ["name", q.name],
    ["season", q.season],
  ])
}

export function penaltyRequest(penaltyId: number): LoungeRequest<"penalty"> {
  return request("penalty", "penalty", [["id", parseArgs(id, penaltyId, "id")]])
}

export function penaltyListRequest(query: PenaltyListQuery): LoungeRequest<"penaltyList"> {
  const q = parseArgs(penaltyListQuerySchema, query, "query")

  return request("penaltyList", "penalty/list", [
    ["name", q.name],
    ["isStrike", q.isStrike],
    ["from", q.from?.toISOString()],
    ["includeDeleted", q.includeDeleted],
    ["season", q.season],
  ])
}

/** What addresses one cached entry of each entity type. */
export type EntityQueries = {
  player: PlayerLookup
  playerDetails: PlayerDetailsLookup
  playerList: PlayerListQuery
  leaderboard: LeaderboardQuery
  table: number
  tableList: TableListQuery
  unverifiedTables: SeasonQuery
  bonus: number
  bonusList: BonusListQuery
  penalty: number
  penaltyList: PenaltyListQuery
}

export const requestBuilders: { readonly [E in EntityType]: (query: EntityQueries[E]) => LoungeRequest<E> } = {
  player: playerRequest,
  playerDetails: playerDetailsRequest,
  playerList: playerListRequest,
  leaderboard: leaderboardRequest,
  table: tableRequest,
  tableList: tableListRequest,
  unverifiedTables: unverifiedTablesRequest,
  bonus: bonusRequest,
  bonusList: bonusListRequest,
  penalty: penaltyRequest,
  penaltyList: penaltyListRequest,
}
