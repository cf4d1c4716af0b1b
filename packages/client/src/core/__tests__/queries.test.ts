import { InvalidArgumentError } from "../../model/client.errors"
import { thrown } from "../../tests/utils/thrown"
import {
  formatLeaderboardSearch,
  leaderboardRequest,
  penaltyListRequest,
  playerDetailsRequest,
  playerListRequest,
  playerRequest,
  tableListRequest,
  tableRequest,
  unverifiedTablesRequest,
  bonusRequest,
  bonusListRequest,
  penaltyRequest,
} from "../queries"

// Inputs the type system forbids but untyped callers can still pass.
function untyped(fn: (input: never) => unknown, input: unknown): unknown {
  return thrown(() => Reflect.apply(fn, undefined, [input]))
}

describe("playerRequest", () => {
  it("sends the name trimmed and keys it lower-cased", () => {
    const req = playerRequest({ name: "  Foo " })

    expect(req).toEqual({
      entity: "player",
      path: "player",
      params: { name: "Foo" },
      key: "player:v1:name=foo",
    })
  })

  it("appends the season after the identifier", () => {
    const req = playerRequest({ id: 123, season: 12 })

    expect(req.params).toEqual({ id: 123, season: 12 })
    expect(req.key).toBe("player:v1:id=123:season=12")
  })

  it("accepts every identifier kind", () => {
    expect(playerRequest({ mkcId: 4567 }).key).toBe("player:v1:mkcId=4567")
    expect(playerRequest({ discordId: "111122223333" }).key).toBe("player:v1:discordId=111122223333")
    expect(playerRequest({ fc: "1234-5678-9012" }).key).toBe("player:v1:fc=1234-5678-9012")
  })

  it("keys names case-insensitively", () => {
    expect(playerRequest({ name: "FOO" }).key).toBe(playerRequest({ name: "foo" }).key)
  })

  it("rejects malformed identifiers before building anything", () => {
    expect(thrown(() => playerRequest({ fc: "123" }))).toMatchObject({
      code: "invalid_argument",
      message: "Invalid lookup.fc: must look like 1234-5678-9012",
      context: { argument: "lookup.fc" },
    })
    expect(thrown(() => playerRequest({ name: "   " }))).toMatchObject({
      message: "Invalid lookup.name: must not be empty",
    })
    expect(thrown(() => playerRequest({ discordId: "abc" }))).toMatchObject({
      context: { argument: "lookup.discordId" },
    })
  })

  it.each([0, -1, 1.5])("rejects id %s", (id) => {
    const err = thrown(() => playerRequest({ id }))

    expect(err).toBeInstanceOf(InvalidArgumentError)
    expect(err).toMatchObject({ context: { argument: "lookup.id" } })
  })

  it("rejects a negative season", () => {
    expect(thrown(() => playerRequest({ id: 1, season: -1 }))).toMatchObject({
      context: { argument: "lookup.season" },
    })
  })

  it("requires exactly one identifier", () => {
    const message = "Invalid lookup: exactly one of id, name, mkcId, discordId, fc is required"

    expect(untyped(playerRequest, {})).toMatchObject({ message })
    expect(untyped(playerRequest, { id: 1, name: "Foo" })).toMatchObject({ message })
  })

  it("rejects unknown keys", () => {
    expect(untyped(playerRequest, { id: 1, nmae: "Foo" })).toBeInstanceOf(InvalidArgumentError)
  })

  it("rejects a missing lookup", () => {
    expect(untyped(playerRequest, undefined)).toMatchObject({ context: { argument: "lookup" } })
  })
})

describe("playerDetailsRequest", () => {
  it("targets player/details", () => {
    expect(playerDetailsRequest({ name: "Foo", season: 11 })).toEqual({
      entity: "playerDetails",
      path: "player/details",
      params: { name: "Foo", season: 11 },
      key: "playerDetails:v1:name=foo:season=11",
    })
  })

  it("accepts only id or name", () => {
    expect(untyped(playerDetailsRequest, { fc: "1234-5678-9012" })).toBeInstanceOf(InvalidArgumentError)
  })
})

describe("playerListRequest", () => {
  it("keys an unqualified list as all", () => {
    expect(playerListRequest()).toEqual({
      entity: "playerList",
      path: "player/list",
      params: {},
      key: "playerList:v1:all",
    })
  })

  it("keeps qualifiers in a fixed order", () => {
    expect(playerListRequest({ season: 12, maxMmr: 9000, minMmr: 8000 }).key).toBe(
      "playerList:v1:minMmr=8000:maxMmr=9000:season=12",
    )
  })

  it("rejects an inverted range", () => {
    expect(thrown(() => playerListRequest({ minMmr: 9000, maxMmr: 8000 }))).toMatchObject({
      message: "Invalid query: minMmr must not exceed maxMmr",
    })
  })
})

describe("leaderboardRequest", () => {
  it("fills in paging defaults", () => {
    const req = leaderboardRequest({ season: 12 })

    expect(req.params).toEqual({ season: 12, skip: 0, pageSize: 50 })
    expect(req.key).toBe("leaderboard:v1:season=12:skip=0:pageSize=50")
  })

  it("formats identity searches", () => {
    expect(leaderboardRequest({ season: 12, search: { mkcId: 55 } }).params.search).toBe("mkc=55")
    expect(leaderboardRequest({ season: 12, search: { discordId: "42" } }).params.search).toBe("discord=42")
    expect(leaderboardRequest({ season: 12, search: { fc: "1234-5678-9012" } }).params.search).toBe(
      "switch=1234-5678-9012",
    )
  })

  it("sends a name search as given but keys it lower-cased", () => {
    const req = leaderboardRequest({ season: 12, search: "Foo" })

    expect(req.params.search).toBe("Foo")
    expect(req.key).toBe("leaderboard:v1:season=12:skip=0:pageSize=50:search=foo")
  })

  it("upper-cases the country code", () => {
    expect(leaderboardRequest({ season: 12, country: "de" }).params.country).toBe("DE")
    expect(thrown(() => leaderboardRequest({ season: 12, country: "DEU" }))).toMatchObject({
      context: { argument: "query.country" },
    })
  })

  it("requires a season", () => {
    expect(untyped(leaderboardRequest, { skip: 0 })).toMatchObject({ context: { argument: "query.season" } })
  })

  it("rejects an empty page", () => {
    expect(thrown(() => leaderboardRequest({ season: 12, pageSize: 0 }))).toMatchObject({
      context: { argument: "query.pageSize" },
    })
  })

  it("rejects an inverted events range", () => {
    expect(thrown(() => leaderboardRequest({ season: 12, minEventsPlayed: 10, maxEventsPlayed: 5 }))).toMatchObject({
      message: "Invalid query: minEventsPlayed must not exceed maxEventsPlayed",
    })
  })
})

describe("formatLeaderboardSearch", () => {
  it("passes name fragments through", () => {
    expect(formatLeaderboardSearch("Fo")).toBe("Fo")
  })
})

describe("table requests", () => {
  it("looks a table up by id", () => {
    expect(tableRequest(9001)).toEqual({
      entity: "table",
      path: "table",
      params: { tableId: 9001 },
      key: "table:v1:tableId=9001",
    })
    expect(thrown(() => tableRequest(0))).toMatchObject({ context: { argument: "tableId" } })
  })

  it("sends dates as ISO strings", () => {
    const req = tableListRequest({
      from: new Date("2024-03-01T00:00:00.000Z"),
      to: new Date("2024-03-02T00:00:00.000Z"),
    })

    expect(req.params).toEqual({ from: "2024-03-01T00:00:00.000Z", to: "2024-03-02T00:00:00.000Z" })
    expect(req.key).toBe("tableList:v1:from=2024-03-01T00%3A00%3A00.000Z:to=2024-03-02T00%3A00%3A00.000Z")
  })

  it("rejects from after to", () => {
    const query = { from: new Date("2024-03-02T00:00:00.000Z"), to: new Date("2024-03-01T00:00:00.000Z") }

    expect(thrown(() => tableListRequest(query))).toMatchObject({ message: "Invalid query: from must not be after to" })
  })

  it("rejects invalid dates", () => {
    expect(thrown(() => tableListRequest({ from: new Date("nope") }))).toMatchObject({
      context: { argument: "query.from" },
    })
  })

  it("lists unverified tables per season", () => {
    expect(unverifiedTablesRequest({ season: 12 })).toMatchObject({
      path: "table/unverified",
      key: "unverifiedTables:v1:season=12",
    })
    expect(unverifiedTablesRequest().key).toBe("unverifiedTables:v1:all")
  })
})

describe("change requests", () => {
  it("looks bonuses and penalties up by id", () => {
    expect(bonusRequest(55)).toMatchObject({ path: "bonus", params: { id: 55 }, key: "bonus:v1:id=55" })
    expect(penaltyRequest(77)).toMatchObject({ path: "penalty", params: { id: 77 }, key: "penalty:v1:id=77" })
  })

  it("requires a player name for bonus lists", () => {
    expect(bonusListRequest({ name: "Foo", season: 12 }).key).toBe("bonusList:v1:name=foo:season=12")
    expect(thrown(() => bonusListRequest({ name: "" }))).toMatchObject({ context: { argument: "query.name" } })
  })

  it("always sends includeDeleted for penalty lists", () => {
    const req = penaltyListRequest({ name: "Foo" })

    expect(req.params).toEqual({ name: "Foo", includeDeleted: false })
    expect(req.key).toBe("penaltyList:v1:name=foo:includeDeleted=false")
  })

  it("orders penalty qualifiers", () => {
    const req = penaltyListRequest({
      season: 12,
      includeDeleted: true,
      from: new Date("2024-01-01T00:00:00.000Z"),
      isStrike: true,
      name: "Foo",
    })

    expect(Object.keys(req.params)).toEqual(["name", "isStrike", "from", "includeDeleted", "season"])
  })
})
