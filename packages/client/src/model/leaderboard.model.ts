import { z } from "zod"
import { decodePayload, Entity, opt } from "./entity"
import { Rank } from "./rank"
import { int } from "./schemas"

const leaderboardPlayerSchema = z.looseObject({
  id: int,
  name: z.string(),
  mmr: int.nullish(),
  maxMmr: int.nullish(),
  overallRank: int.nullish(),
  countryCode: z.string().nullish(),
  eventsPlayed: int,
  winRate: z.number().nullish(),
  winsLastTen: int,
  lossesLastTen: int,
  gainLossLastTen: int.nullish(),
  largestGain: int.nullish(),
  largestLoss: int.nullish(),
  maxRank: z.string().nullish(),
  maxMmrRank: z.string().nullish(),
})

export type LeaderboardPlayerPayload = z.output<typeof leaderboardPlayerSchema>

export class LeaderboardPlayer extends Entity<LeaderboardPlayerPayload> {
  static readonly schema = leaderboardPlayerSchema

  /** @internal */
  static from(payload: LeaderboardPlayerPayload): LeaderboardPlayer {
    return new LeaderboardPlayer(payload)
  }

  private constructor(payload: LeaderboardPlayerPayload) {
    super(payload, leaderboardPlayerSchema.shape)
  }

  get id(): number {
    return this.payload.id
  }

  get name(): string {
    return this.payload.name
  }

  get mmr(): number | undefined {
    return opt(this.payload.mmr)
  }

  get maxMmr(): number | undefined {
    return opt(this.payload.maxMmr)
  }

  get overallRank(): number | undefined {
    return opt(this.payload.overallRank)
  }

  get countryCode(): string | undefined {
    return opt(this.payload.countryCode)
  }

  get eventsPlayed(): number {
    return this.payload.eventsPlayed
  }

  get winRate(): number | undefined {
    return opt(this.payload.winRate)
  }

  get winsLastTen(): number {
    return this.payload.winsLastTen
  }

  get lossesLastTen(): number {
    return this.payload.lossesLastTen
  }

  get gainLossLastTen(): number | undefined {
    return opt(this.payload.gainLossLastTen)
  }

  get largestGain(): number | undefined {
    return opt(this.payload.largestGain)
  }

  get largestLoss(): number | undefined {
    return opt(this.payload.largestLoss)
  }

  /** Highest rank reached, e.g. `"Diamond 1"`. */
  get maxRank(): string | undefined {
    return opt(this.payload.maxRank)
  }

  get maxRankInfo(): Rank | undefined {
    const name = this.payload.maxRank

    return name === null || name === undefined ? undefined : Rank.fromName(name)
  }

  get maxMmrRank(): string | undefined {
    return opt(this.payload.maxMmrRank)
  }
}

const leaderboardSchema = z.looseObject({
  totalPlayers: int,
  data: z.array(leaderboardPlayerSchema),
})

export type LeaderboardPayload = z.output<typeof leaderboardSchema>

/**
 * One page of the season leaderboard. Iterable over its players.
 */
export class Leaderboard extends Entity<LeaderboardPayload> implements Iterable<LeaderboardPlayer> {
  static readonly schema = leaderboardSchema

  readonly players: readonly LeaderboardPlayer[]

  static decode(data: unknown): Leaderboard {
    return new Leaderboard(decodePayload(leaderboardSchema, data, "leaderboard"))
  }

  private constructor(payload: LeaderboardPayload) {
    super(payload, leaderboardSchema.shape)

    this.players = Object.freeze(payload.data.map((row) => LeaderboardPlayer.from(row)))
  }

  /** Players matching the query across all pages. */
  get totalPlayers(): number {
    return this.payload.totalPlayers
  }

  /** Players on this page. */
  get length(): number {
    return this.players.length
  }

  at(index: number): LeaderboardPlayer | undefined {
    return this.players.at(index)
  }

  [Symbol.iterator](): Iterator<LeaderboardPlayer> {
    return this.players[Symbol.iterator]()
  }
}
