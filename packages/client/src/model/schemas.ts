import { z } from "zod"
import { changeReasons, tiers } from "./enums"

export const dateString = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  error: "Invalid date",
})

export const int = z.number().int()

export const tier = z.enum(tiers)

export const changeReason = z.enum(changeReasons)
