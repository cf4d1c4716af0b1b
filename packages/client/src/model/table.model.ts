import { z } from "zod"
import type { Tier } from "./enums"
import { decodeList, decodePayload, Entity, opt, optDate, toDate } from "./entity"
import { dateString, int, tier } from "./schemas"

const tableScoreSchema = z.looseObject({
  score: int,
  multiplier: z.number(),
  playerId: int,
  playerName: z.string(),
  playerDiscordId: z.string().nullish(),
  playerCountryCode: z.string().nullish(),
  delta: int.nullish(),
  prevMmr: int.nullish(),
  newMmr: int.nullish(),
})

export type TableScorePayload = z.output<typeof tableScoreSchema>

/** One player's line on a table. */
export class TableScore extends Entity<TableScorePayload> {
  /** @internal */
  static from(payload: TableScorePayload): TableScore {
    return new TableScore(payload)
  }

  private constructor(payload: TableScorePayload) {
    super(payload, tableScoreSchema.shape)
  }

  get score(): number {
    return this.payload.score
  }

  /** Scaling applied to the MMR delta (e.g. 0.5 for a sub). */
  get multiplier(): number {
    return this.payload.multiplier
  }

  get playerId(): number {
    return this.payload.playerId
  }

  get playerName(): string {
    return this.payload.playerName
  }

  get playerDiscordId(): string | undefined {
    return opt(this.payload.playerDiscordId)
  }

  get playerCountryCode(): string | undefined {
    return opt(this.payload.playerCountryCode)
  }

  /** Set once the table is verified. */
  get delta(): number | undefined {
    return opt(this.payload.delta)
  }

  get prevMmr(): number | undefined {
    return opt(this.payload.prevMmr)
  }

  get newMmr(): number | undefined {
    return opt(this.payload.newMmr)
  }
}

const tableTeamSchema = z.looseObject({
  rank: int,
  scores: z.array(tableScoreSchema),
})

export type TableTeamPayload = z.output<typeof tableTeamSchema>

/**
 * A team's placement inside a table. Players are referenced by id and name.
 */
export class TableTeam extends Entity<TableTeamPayload> {
  readonly scores: readonly TableScore[]

  /** @internal */
  static from(payload: TableTeamPayload): TableTeam {
    return new TableTeam(payload)
  }

  private constructor(payload: TableTeamPayload) {
    super(payload, tableTeamSchema.shape)

    this.scores = Object.freeze(payload.scores.map((score) => TableScore.from(score)))
  }

  get rank(): number {
    return this.payload.rank
  }

  get totalScore(): number {
    return this.scores.reduce((sum, line) => sum + line.score, 0)
  }

  get playerIds(): readonly number[] {
    return this.scores.map((line) => line.playerId)
  }
}

const tableSchema = z.looseObject({
  id: int,
  season: int.nullish(),
  score: int,
  createdOn: dateString,
  verifiedOn: dateString.nullish(),
  deletedOn: dateString.nullish(),
  numTeams: int,
  url: z.string(),
  tier,
  teams: z.array(tableTeamSchema),
  tableMessageId: z.string().nullish(),
  updateMessageId: z.string().nullish(),
  authorId: z.string().nullish(),
})

export type TablePayload = z.output<typeof tableSchema>

/**
 * A submitted match result.
 */
export class Table extends Entity<TablePayload> {
  static readonly schema = tableSchema

  readonly teams: readonly TableTeam[]

  static decode(data: unknown): Table {
    return new Table(decodePayload(tableSchema, data, "table"))
  }

  private constructor(payload: TablePayload) {
    super(payload, tableSchema.shape)

    this.teams = Object.freeze(payload.teams.map((team) => TableTeam.from(team)))
  }

  get id(): number {
    return this.payload.id
  }

  get season(): number | undefined {
    return opt(this.payload.season)
  }

  /** Total points scored on the table. */
  get score(): number {
    return this.payload.score
  }

  get createdOn(): Date {
    return toDate(this.payload.createdOn)
  }

  get verifiedOn(): Date | undefined {
    return optDate(this.payload.verifiedOn)
  }

  get deletedOn(): Date | undefined {
    return optDate(this.payload.deletedOn)
  }

  get isVerified(): boolean {
    return this.verifiedOn !== undefined
  }

  get isDeleted(): boolean {
    return this.deletedOn !== undefined
  }

  get numTeams(): number {
    return this.payload.numTeams
  }

  /** Link to the rendered table image. */
  get url(): string {
    return this.payload.url
  }

  get tier(): Tier {
    return this.payload.tier
  }

  get tableMessageId(): string | undefined {
    return opt(this.payload.tableMessageId)
  }

  get updateMessageId(): string | undefined {
    return opt(this.payload.updateMessageId)
  }

  get authorId(): string | undefined {
    return opt(this.payload.authorId)
  }

  /** Team containing `playerId`, if the player is on this table. */
  teamOf(playerId: number): TableTeam | undefined {
    return this.teams.find((team) => team.scores.some((line) => line.playerId === playerId))
  }
}

export function decodeTableList(data: unknown): readonly Table[] {
  return decodeList(data, "table list", (item) => Table.decode(item))
}
