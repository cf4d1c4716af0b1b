export {
  DEFAULT_BASE_URL,
  FetchTransport,
  type FetchTransportDeps,
  type FetchTransportOptions,
} from "./adapters/fetch/fetch-transport"
export { type ConfigOverrides, ENV_PREFIX, loadClientConfig } from "./config/load-client-config"
export { type ClientConfig, type EnvConfig, envSchema, mapEnvToConfig } from "./config/schema"
export type { EntityValues } from "./core/entity-caches"
export { type EntityType, isEntityType, keyspace } from "./core/keyspace"
export {
  type CallOptions,
  type GetPlayersOptions,
  LoungeClient,
  type LoungeClientDeps,
  type LoungeClientOptions,
} from "./core/lounge-client"
export {
  type BonusListQuery,
  DEFAULT_PAGE_SIZE,
  type EntityQueries,
  formatLeaderboardSearch,
  type LeaderboardQuery,
  type LeaderboardSearch,
  type PenaltyListQuery,
  type PlayerDetailsLookup,
  type PlayerIdentifier,
  type PlayerListQuery,
  type PlayerLookup,
  type SeasonQuery,
  type TableListQuery,
} from "./core/queries"
export { createLoungeClient, type CreateLoungeClientOverrides, isRetryableTransportError } from "./create"
export { Bonus, type BonusPayload, MmrAdjustment, Penalty, type PenaltyPayload } from "./model/change.model"
export {
  DecodeError,
  InvalidArgumentError,
  type LoungeClientError,
  NotFoundError,
  TransportError,
} from "./model/client.errors"
export { Entity } from "./model/entity"
export { type ChangeReason, changeReasons, type Tier, tiers } from "./model/enums"
export {
  Leaderboard,
  type LeaderboardPayload,
  LeaderboardPlayer,
  type LeaderboardPlayerPayload,
} from "./model/leaderboard.model"
export {
  MmrChange,
  type MmrChangePayload,
  NameChange,
  type NameChangePayload,
  PlayerDetails,
  type PlayerDetailsPayload,
} from "./model/player-details.model"
export { PartialPlayer, type PartialPlayerPayload, Player, type PlayerPayload } from "./model/player.model"
export { Rank } from "./model/rank"
export {
  Table,
  type TablePayload,
  TableScore,
  type TableScorePayload,
  TableTeam,
  type TableTeamPayload,
} from "./model/table.model"
export type { QueryValue, Transport, TransportRequest, TransportResponse } from "./ports/transport"
export { withLoungeClient } from "./session"
