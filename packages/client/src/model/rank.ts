/**
 * A rank name split into its division and optional level.
 *
 * @example
 * ```ts
 * Rank.fromName("Diamond 2") // { division: "Diamond", level: 2, name: "Diamond 2" }
 * Rank.fromName("Grandmaster") // { division: "Grandmaster", level: undefined, ... }
 * ```
 */
export class Rank {
  private constructor(
    readonly name: string,
    readonly division: string,
    readonly level: number | undefined,
  ) {
    Object.freeze(this)
  }

  static fromName(name: string): Rank {
    const trimmed = name.trim()
    const space = trimmed.lastIndexOf(" ")
    const level = trimmed.slice(space + 1)

    if (space > 0 && /^\d+$/.test(level)) {
      return new Rank(trimmed, trimmed.slice(0, space), Number.parseInt(level, 10))
    }

    return new Rank(trimmed, trimmed, undefined)
  }

  toString(): string {
    return this.name
  }
}
