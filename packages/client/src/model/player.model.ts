import { z } from "zod"
import { decodeList, decodePayload, Entity, opt } from "./entity"
import { int } from "./schemas"

const playerSchema = z.looseObject({
  id: int,
  name: z.string(),
  mkcId: int.nullish(),
  discordId: z.string().nullish(),
  countryCode: z.string().nullish(),
  switchFc: z.string().nullish(),
  isHidden: z.boolean().nullish(),
  mmr: int.nullish(),
  maxMmr: int.nullish(),
  rank: int.nullish(),
})

export type PlayerPayload = z.output<typeof playerSchema>

export class Player extends Entity<PlayerPayload> {
  static readonly schema = playerSchema

  static decode(data: unknown): Player {
    return new Player(decodePayload(playerSchema, data, "player"))
  }

  private constructor(payload: PlayerPayload) {
    super(payload, playerSchema.shape)
  }

  get id(): number {
    return this.payload.id
  }

  get name(): string {
    return this.payload.name
  }

  get mkcId(): number | undefined {
    return opt(this.payload.mkcId)
  }

  get discordId(): string | undefined {
    return opt(this.payload.discordId)
  }

  get countryCode(): string | undefined {
    return opt(this.payload.countryCode)
  }

  /** Switch friend code, `dddd-dddd-dddd`. */
  get switchFc(): string | undefined {
    return opt(this.payload.switchFc)
  }

  get isHidden(): boolean {
    return this.payload.isHidden ?? false
  }

  /** Absent until the player finished placement. */
  get mmr(): number | undefined {
    return opt(this.payload.mmr)
  }

  get maxMmr(): number | undefined {
    return opt(this.payload.maxMmr)
  }

  get rank(): number | undefined {
    return opt(this.payload.rank)
  }
}

const partialPlayerSchema = z.looseObject({
  name: z.string(),
  mkcId: int,
  eventsPlayed: int,
  mmr: int.nullish(),
  discordId: z.string().nullish(),
})

export type PartialPlayerPayload = z.output<typeof partialPlayerSchema>

/** Row of the player list; carries no id. */
export class PartialPlayer extends Entity<PartialPlayerPayload> {
  static readonly schema = partialPlayerSchema

  static decode(data: unknown): PartialPlayer {
    return new PartialPlayer(decodePayload(partialPlayerSchema, data, "partial player"))
  }

  private constructor(payload: PartialPlayerPayload) {
    super(payload, partialPlayerSchema.shape)
  }

  get name(): string {
    return this.payload.name
  }

  get mkcId(): number {
    return this.payload.mkcId
  }

  get eventsPlayed(): number {
    return this.payload.eventsPlayed
  }

  get mmr(): number | undefined {
    return opt(this.payload.mmr)
  }

  get discordId(): string | undefined {
    return opt(this.payload.discordId)
  }
}

const playerListSchema = z.looseObject({
  players: z.array(z.unknown()),
})

export function decodePlayerList(data: unknown): readonly PartialPlayer[] {
  const { players } = decodePayload(playerListSchema, data, "player list")

  return decodeList(players, "player list", (item) => PartialPlayer.decode(item))
}
