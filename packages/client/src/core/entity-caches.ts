import type { Clock } from "@loungekit/clock"
import { type CreateReadThroughCacheOptions, createReadThroughCache, type ReadThroughCache } from "@loungekit/cache"
import { Bonus, decodeBonusList, decodePenaltyList, Penalty } from "../model/change.model"
import { Leaderboard } from "../model/leaderboard.model"
import { PlayerDetails } from "../model/player-details.model"
import { decodePlayerList, type PartialPlayer, Player } from "../model/player.model"
import { decodeTableList, Table } from "../model/table.model"
import type { EntityType } from "./keyspace"

/** What each entity type caches. */
export type EntityValues = {
  player: Player
  playerDetails: PlayerDetails
  playerList: readonly PartialPlayer[]
  leaderboard: Leaderboard
  table: Table
  tableList: readonly Table[]
  unverifiedTables: readonly Table[]
  bonus: Bonus
  bonusList: readonly Bonus[]
  penalty: Penalty
  penaltyList: readonly Penalty[]
}

export type EntityCaches = { readonly [E in EntityType]: ReadThroughCache<EntityValues[E]> }

export type Decoders = { readonly [E in EntityType]: (data: unknown) => EntityValues[E] }

export const decoders: Decoders = {
  player: Player.decode,
  playerDetails: PlayerDetails.decode,
  playerList: decodePlayerList,
  leaderboard: Leaderboard.decode,
  table: Table.decode,
  tableList: decodeTableList,
  unverifiedTables: decodeTableList,
  bonus: Bonus.decode,
  bonusList: decodeBonusList,
  penalty: Penalty.decode,
  penaltyList: decodePenaltyList,
}

/**
 * One read-through cache per entity type, all with the same policy.
 */
export function createEntityCaches(opts: CreateReadThroughCacheOptions, clock: Clock): EntityCaches {
  return {
    player: createReadThroughCache(opts, clock),
    playerDetails: createReadThroughCache(opts, clock),
    playerList: createReadThroughCache(opts, clock),
    leaderboard: createReadThroughCache(opts, clock),
    table: createReadThroughCache(opts, clock),
    tableList: createReadThroughCache(opts, clock),
    unverifiedTables: createReadThroughCache(opts, clock),
    bonus: createReadThroughCache(opts, clock),
    bonusList: createReadThroughCache(opts, clock),
    penalty: createReadThroughCache(opts, clock),
    penaltyList: createReadThroughCache(opts, clock),
  }
}
