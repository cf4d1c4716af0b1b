export const tiers = [
  "X",
  "S",
  "A",
  "AB",
  "B",
  "BC",
  "C",
  "CD",
  "D",
  "DE",
  "E",
  "EF",
  "F",
  "FG",
  "G",
  "SQ",
] as const

/** Room tier a table was played in; `"SQ"` is squad queue. */
export type Tier = (typeof tiers)[number]

export const changeReasons = [
  "Placement",
  "Table",
  "Penalty",
  "Strike",
  "Bonus",
  "TableDelete",
  "PenaltyDelete",
  "StrikeDelete",
  "BonusDelete",
] as const

/** Why a player's MMR moved. */
export type ChangeReason = (typeof changeReasons)[number]
