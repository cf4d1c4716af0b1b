import { z } from "zod"
import type { ChangeReason, Tier } from "./enums"
import { decodePayload, Entity, opt, toDate } from "./entity"
import { Rank } from "./rank"
import { changeReason, dateString, int, tier } from "./schemas"

const mmrChangeSchema = z.looseObject({
  changeId: int.nullish(),
  newMmr: int,
  mmrDelta: int,
  reason: changeReason,
  time: dateString,
  score: int.nullish(),
  partnerScores: z.array(int).nullish(),
  partnerIds: z.array(int).nullish(),
  tier: tier.nullish(),
  numTeams: int.nullish(),
})

export type MmrChangePayload = z.output<typeof mmrChangeSchema>

export class MmrChange extends Entity<MmrChangePayload> {
  static readonly schema = mmrChangeSchema

  static decode(data: unknown): MmrChange {
    return MmrChange.from(decodePayload(mmrChangeSchema, data, "mmr change"))
  }

  /** @internal */
  static from(payload: MmrChangePayload): MmrChange {
    return new MmrChange(payload)
  }

  private constructor(payload: MmrChangePayload) {
    super(payload, mmrChangeSchema.shape)
  }

  /** Table, penalty or bonus id, depending on {@link MmrChange.reason}. */
  get changeId(): number | undefined {
    return opt(this.payload.changeId)
  }

  get newMmr(): number {
    return this.payload.newMmr
  }

  get mmrDelta(): number {
    return this.payload.mmrDelta
  }

  get reason(): ChangeReason {
    return this.payload.reason
  }

  get time(): Date {
    return toDate(this.payload.time)
  }

  get score(): number | undefined {
    return opt(this.payload.score)
  }

  get partnerScores(): readonly number[] {
    return this.payload.partnerScores ?? []
  }

  get partnerIds(): readonly number[] {
    return this.payload.partnerIds ?? []
  }

  get tier(): Tier | undefined {
    return opt(this.payload.tier)
  }

  get numTeams(): number | undefined {
    return opt(this.payload.numTeams)
  }
}

const nameChangeSchema = z.looseObject({
  name: z.string(),
  changedOn: dateString,
})

export type NameChangePayload = z.output<typeof nameChangeSchema>

export class NameChange extends Entity<NameChangePayload> {
  static readonly schema = nameChangeSchema

  /** @internal */
  static from(payload: NameChangePayload): NameChange {
    return new NameChange(payload)
  }

  private constructor(payload: NameChangePayload) {
    super(payload, nameChangeSchema.shape)
  }

  get name(): string {
    return this.payload.name
  }

  get changedOn(): Date {
    return toDate(this.payload.changedOn)
  }
}

const playerDetailsSchema = z.looseObject({
  playerId: int,
  name: z.string(),
  mkcId: int.nullish(),
  countryCode: z.string().nullish(),
  countryName: z.string().nullish(),
  switchFc: z.string().nullish(),
  isHidden: z.boolean().nullish(),
  season: int,
  mmr: int.nullish(),
  maxMmr: int.nullish(),
  overallRank: int.nullish(),
  eventsPlayed: int,
  winRate: z.number().nullish(),
  winsLastTen: int,
  lossesLastTen: int,
  gainLossLastTen: int.nullish(),
  largestGain: int.nullish(),
  largestGainTableId: int.nullish(),
  largestLoss: int.nullish(),
  largestLossTableId: int.nullish(),
  averageScore: z.number().nullish(),
  averageLastTen: z.number().nullish(),
  partnerAverage: z.number().nullish(),
  mmrChanges: z.array(mmrChangeSchema).nullish(),
  nameHistory: z.array(nameChangeSchema).nullish(),
  rank: z.string(),
})

export type PlayerDetailsPayload = z.output<typeof playerDetailsSchema>

/**
 * A player's season profile with MMR and name history.
 */
export class PlayerDetails extends Entity<PlayerDetailsPayload> {
  static readonly schema = playerDetailsSchema

  readonly mmrChanges: readonly MmrChange[]
  readonly nameHistory: readonly NameChange[]

  static decode(data: unknown): PlayerDetails {
    return new PlayerDetails(decodePayload(playerDetailsSchema, data, "player details"))
  }

  private constructor(payload: PlayerDetailsPayload) {
    super(payload, playerDetailsSchema.shape)

    this.mmrChanges = Object.freeze((payload.mmrChanges ?? []).map((change) => MmrChange.from(change)))
    this.nameHistory = Object.freeze((payload.nameHistory ?? []).map((change) => NameChange.from(change)))
  }

  get playerId(): number {
    return this.payload.playerId
  }

  get name(): string {
    return this.payload.name
  }

  get mkcId(): number | undefined {
    return opt(this.payload.mkcId)
  }

  get countryCode(): string | undefined {
    return opt(this.payload.countryCode)
  }

  get countryName(): string | undefined {
    return opt(this.payload.countryName)
  }

  get switchFc(): string | undefined {
    return opt(this.payload.switchFc)
  }

  get isHidden(): boolean {
    return this.payload.isHidden ?? false
  }

  get season(): number {
    return this.payload.season
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

  get eventsPlayed(): number {
    return this.payload.eventsPlayed
  }

  /** Between 0 and 1. */
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

  get largestGainTableId(): number | undefined {
    return opt(this.payload.largestGainTableId)
  }

  get largestLoss(): number | undefined {
    return opt(this.payload.largestLoss)
  }

  get largestLossTableId(): number | undefined {
    return opt(this.payload.largestLossTableId)
  }

  get averageScore(): number | undefined {
    return opt(this.payload.averageScore)
  }

  get averageLastTen(): number | undefined {
    return opt(this.payload.averageLastTen)
  }

  get partnerAverage(): number | undefined {
    return opt(this.payload.partnerAverage)
  }

  /** Rank name as sent, e.g. `"Diamond 2"`. */
  get rank(): string {
    return this.payload.rank
  }

  get rankInfo(): Rank {
    return Rank.fromName(this.payload.rank)
  }
}
