import { randomUUID } from "node:crypto"
import type { CacheStats, CreateReadThroughCacheOptions, ReadThroughCache } from "@loungekit/cache"
import { type Clock, SystemClock } from "@loungekit/clock"
import { createNullLogger, type Logger } from "@loungekit/logger"
import type { Bonus, Penalty } from "../model/change.model"
import { NotFoundError, TransportError } from "../model/client.errors"
import type { Leaderboard } from "../model/leaderboard.model"
import type { PlayerDetails } from "../model/player-details.model"
import type { PartialPlayer, Player } from "../model/player.model"
import type { Table } from "../model/table.model"
import type { Transport } from "../ports/transport"
import { createEntityCaches, decoders, type EntityCaches, type EntityValues } from "./entity-caches"
import { type EntityType, isEntityType, keyspace } from "./keyspace"
import {
  bonusListRequest,
  type BonusListQuery,
  bonusRequest,
  type EntityQueries,
  leaderboardRequest,
  type LeaderboardQuery,
  type LoungeRequest,
  penaltyListRequest,
  type PenaltyListQuery,
  penaltyRequest,
  playerDetailsRequest,
  type PlayerDetailsLookup,
  playerListRequest,
  type PlayerListQuery,
  type PlayerLookup,
  playerRequest,
  requestBuilders,
  type SeasonQuery,
  tableListRequest,
  type TableListQuery,
  tableRequest,
  unverifiedTablesRequest,
} from "./queries"

export type CallOptions = {
  /** Stops this call waiting. A lookup shared with other callers keeps going. */
  signal?: AbortSignal
}

export type GetPlayersOptions = CallOptions & {
  /** Applied to every lookup that names no season of its own. */
  season?: number
}

export type LoungeClientOptions = {
  /** Policy shared by every entity cache. No expiry unless `ttl` is set. */
  cache?: CreateReadThroughCacheOptions
  /** Bound to every log entry; random when omitted. */
  sessionId?: string
}

export type LoungeClientDeps = {
  transport: Transport
  logger?: Logger
  clock?: Clock
}

type SessionState = "idle" | "open" | "closed"

const entityTypes: readonly EntityType[] = Object.keys(keyspace).filter(isEntityType)

/**
 * Typed, cached access to the Lounge statistics service.
 *
 * One instance is one session: it owns the transport and a read-through cache
 * per entity type. Identical lookups are answered from the cache; concurrent
 * identical lookups share a single request.
 *
 * @example
 * ```ts
 * const client = new LoungeClient({ transport })
 * await client.open()
 * try {
 *   const player = await client.getPlayer({ name: "Foo", season: 12 })
 * } finally {
 *   await client.close()
 * }
 * ```
 */
export class LoungeClient {
  private state: SessionState = "idle"
  private closing?: Promise<void>

  private readonly transport: Transport
  private readonly logger: Logger
  private readonly caches: EntityCaches

  constructor(deps: LoungeClientDeps, opts: LoungeClientOptions = {}) {
    this.transport = deps.transport
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "client",
      session: opts.sessionId ?? randomUUID(),
    })
    this.caches = createEntityCaches(opts.cache ?? {}, deps.clock ?? new SystemClock())
  }

  get isOpen(): boolean {
    return this.state === "open"
  }

  async open(): Promise<void> {
    if (this.state === "closed") throw TransportError.closed()
    if (this.state === "open") return

    await this.transport.open()
    this.state = "open"
    this.logger.info("session opened")
  }

  /**
   * Aborts in-flight lookups, releases the transport and drops every cached
   * entry. Repeated calls share the first call's promise.
   */
  close(): Promise<void> {
    this.closing ??= this.shutdown()

    return this.closing
  }

  async getPlayer(lookup: PlayerLookup, opts?: CallOptions): Promise<Player> {
    return this.read(playerRequest(lookup), "getPlayer", opts)
  }

  /**
   * Looks players up concurrently. A player that does not exist yields
   * `undefined` in its slot; any other failure rejects the whole call.
   */
  async getPlayers(lookups: readonly PlayerLookup[], opts: GetPlayersOptions = {}): Promise<(Player | undefined)[]> {
    const { season, ...call } = opts

    return Promise.all(
      lookups.map(async (lookup) => {
        try {
          return await this.getPlayer(
            season === undefined || lookup.season !== undefined ? lookup : { ...lookup, season },
            call,
          )
        } catch (err) {
          if (err instanceof NotFoundError) return undefined
          throw err
        }
      }),
    )
  }

  async getPlayerDetails(lookup: PlayerDetailsLookup, opts?: CallOptions): Promise<PlayerDetails> {
    return this.read(playerDetailsRequest(lookup), "getPlayerDetails", opts)
  }

  async listPlayers(query: PlayerListQuery = {}, opts?: CallOptions): Promise<readonly PartialPlayer[]> {
    return this.read(playerListRequest(query), "listPlayers", opts)
  }

  async getLeaderboard(query: LeaderboardQuery, opts?: CallOptions): Promise<Leaderboard> {
    return this.read(leaderboardRequest(query), "getLeaderboard", opts)
  }

  async getTable(tableId: number, opts?: CallOptions): Promise<Table> {
    return this.read(tableRequest(tableId), "getTable", opts)
  }

  async listTables(query: TableListQuery = {}, opts?: CallOptions): Promise<readonly Table[]> {
    return this.read(tableListRequest(query), "listTables", opts)
  }

  async listUnverifiedTables(query: SeasonQuery = {}, opts?: CallOptions): Promise<readonly Table[]> {
    return this.read(unverifiedTablesRequest(query), "listUnverifiedTables", opts)
  }

  async getBonus(bonusId: number, opts?: CallOptions): Promise<Bonus> {
    return this.read(bonusRequest(bonusId), "getBonus", opts)
  }

  async listBonuses(query: BonusListQuery, opts?: CallOptions): Promise<readonly Bonus[]> {
    return this.read(bonusListRequest(query), "listBonuses", opts)
  }

  async getPenalty(penaltyId: number, opts?: CallOptions): Promise<Penalty> {
    return this.read(penaltyRequest(penaltyId), "getPenalty", opts)
  }

  async listPenalties(query: PenaltyListQuery, opts?: CallOptions): Promise<readonly Penalty[]> {
    return this.read(penaltyListRequest(query), "listPenalties", opts)
  }

  /**
   * Drops the entry the matching getter would cache for `query`, validated and
   * normalised the same way. A lookup in progress for it still answers its
   * callers but is not cached.
   *
   * @example
   * ```ts
   * client.invalidate("player", { name: "Foo", season: 12 })
   * client.invalidate("table", 9001)
   * ```
   */
  invalidate<E extends EntityType>(type: E, query: EntityQueries[E]): boolean {
    const { key } = requestBuilders[type](query)

    return this.caches[type].invalidate(key)
  }

  /** Drops every entry of `type`, or of every type. */
  clearCache(type?: EntityType): void {
    for (const entity of type === undefined ? entityTypes : [type]) {
      this.caches[entity].clear()
    }
  }

  cacheStats(): Readonly<Record<EntityType, CacheStats>> {
    return {
      player: this.caches.player.stats(),
      playerDetails: this.caches.playerDetails.stats(),
      playerList: this.caches.playerList.stats(),
      leaderboard: this.caches.leaderboard.stats(),
      table: this.caches.table.stats(),
      tableList: this.caches.tableList.stats(),
      unverifiedTables: this.caches.unverifiedTables.stats(),
      bonus: this.caches.bonus.stats(),
      bonusList: this.caches.bonusList.stats(),
      penalty: this.caches.penalty.stats(),
      penaltyList: this.caches.penaltyList.stats(),
    }
  }

  private async read<E extends EntityType>(
    req: LoungeRequest<E>,
    operation: string,
    opts: CallOptions = {},
  ): Promise<EntityValues[E]> {
    if (this.state !== "open") throw TransportError.closed(req.path)

    const decode = decoders[req.entity]
    const cache: ReadThroughCache<EntityValues[E]> = this.caches[req.entity]
    const { value, source } = await cache.read(
      req.key,
      async () => decode(await this.fetch(req)),
      opts,
    )

    this.logger.debug("lookup served", { operation, entity: req.entity, key: req.key, cache: source })

    return value
  }

  private async fetch(req: LoungeRequest): Promise<unknown> {
    const { status, data } = await this.transport.request({ method: "GET", path: req.path, params: req.params })

    if (status === 404) throw NotFoundError.forRequest(req.entity, req.path, req.params)
    if (status < 200 || status >= 300) throw TransportError.status(req.path, status, data)

    return data
  }

  private async shutdown(): Promise<void> {
    const wasOpen = this.state === "open"
    this.state = "closed"

    try {
      await this.transport.close()
    } finally {
      this.clearCache()
      if (wasOpen) this.logger.info("session closed")
    }
  }
}
