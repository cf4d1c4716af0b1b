import { z } from "zod"
import { decodeList, decodePayload, Entity, optDate, toDate } from "./entity"
import { dateString, int } from "./schemas"

const changeShape = {
  id: int,
  season: int,
  awardedOn: dateString,
  prevMmr: int,
  newMmr: int,
  amount: int,
  deletedOn: dateString.nullish(),
  playerId: int,
  playerName: z.string(),
}

const bonusSchema = z.looseObject(changeShape)
const penaltySchema = z.looseObject({ ...changeShape, isStrike: z.boolean() })

export type BonusPayload = z.output<typeof bonusSchema>
export type PenaltyPayload = z.output<typeof penaltySchema>

/**
 * A manual MMR adjustment. Shared by bonuses and penalties.
 */
export abstract class MmrAdjustment<P extends BonusPayload> extends Entity<P> {
  get id(): number {
    return this.payload.id
  }

  get season(): number {
    return this.payload.season
  }

  get awardedOn(): Date {
    return toDate(this.payload.awardedOn)
  }

  get prevMmr(): number {
    return this.payload.prevMmr
  }

  get newMmr(): number {
    return this.payload.newMmr
  }

  /** Signed MMR change as applied. */
  get amount(): number {
    return this.payload.amount
  }

  get deletedOn(): Date | undefined {
    return optDate(this.payload.deletedOn)
  }

  get isDeleted(): boolean {
    return this.deletedOn !== undefined
  }

  get playerId(): number {
    return this.payload.playerId
  }

  get playerName(): string {
    return this.payload.playerName
  }
}

export class Bonus extends MmrAdjustment<BonusPayload> {
  static readonly schema = bonusSchema

  static decode(data: unknown): Bonus {
    return new Bonus(decodePayload(bonusSchema, data, "bonus"))
  }

  private constructor(payload: BonusPayload) {
    super(payload, bonusSchema.shape)
  }
}

export class Penalty extends MmrAdjustment<PenaltyPayload> {
  static readonly schema = penaltySchema

  static decode(data: unknown): Penalty {
    return new Penalty(decodePayload(penaltySchema, data, "penalty"))
  }

  private constructor(payload: PenaltyPayload) {
    super(payload, penaltySchema.shape)
  }

  /** Strikes count towards a temporary ban. */
  get isStrike(): boolean {
    return this.payload.isStrike
  }
}

export function decodeBonusList(data: unknown): readonly Bonus[] {
  return decodeList(data, "bonus list", (item) => Bonus.decode(item))
}

export function decodePenaltyList(data: unknown): readonly Penalty[] {
  return decodeList(data, "penalty list", (item) => Penalty.decode(item))
}
