export function playerJson(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 123,
    name: "Foo",
    mkcId: 4567,
    discordId: "111122223333",
    countryCode: "DE",
    switchFc: "1234-5678-9012",
    isHidden: false,
    mmr: 7250,
    maxMmr: 7600,
    ...overrides,
  }
}

export function scoreJson(playerId: number, score: number, overrides: Record<string, unknown> = {}) {
  return {
    score,
    multiplier: 1,
    playerId,
    playerName: `Player ${playerId}`,
    delta: 40,
    prevMmr: 5000,
    newMmr: 5040,
    ...overrides,
  }
}

export function tableJson(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 9001,
    season: 12,
    score: 984,
    createdOn: "2024-03-01T20:00:00.000Z",
    verifiedOn: "2024-03-01T20:15:00.000Z",
    numTeams: 2,
    url: "/TableImage/9001.png",
    tier: "A",
    teams: [
      { rank: 1, scores: [scoreJson(1, 90), scoreJson(2, 80)] },
      { rank: 2, scores: [scoreJson(3, 70), scoreJson(4, 60)] },
    ],
    ...overrides,
  }
}

export function bonusJson(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 55,
    season: 12,
    awardedOn: "2024-02-10T12:00:00.000Z",
    prevMmr: 5000,
    newMmr: 5100,
    amount: 100,
    playerId: 123,
    playerName: "Foo",
    ...overrides,
  }
}

export function penaltyJson(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return { ...bonusJson({ id: 77, newMmr: 4950, amount: -50 }), isStrike: true, ...overrides }
}

export function leaderboardRowJson(id: number, overrides: Record<string, unknown> = {}) {
  return {
    id,
    name: `Player ${id}`,
    mmr: 8000 - id,
    eventsPlayed: 30,
    winsLastTen: 6,
    lossesLastTen: 4,
    maxRank: "Diamond 1",
    ...overrides,
  }
}

export function playerDetailsJson(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    playerId: 123,
    name: "Foo",
    season: 12,
    mmr: 7250,
    eventsPlayed: 40,
    winsLastTen: 7,
    lossesLastTen: 3,
    rank: "Diamond 2",
    mmrChanges: [
      {
        changeId: 9001,
        newMmr: 7250,
        mmrDelta: 40,
        reason: "Table",
        time: "2024-03-01T20:15:00.000Z",
        score: 90,
        partnerScores: [80],
        partnerIds: [2],
        tier: "A",
        numTeams: 2,
      },
      { newMmr: 7210, mmrDelta: 7210, reason: "Placement", time: "2024-01-05T10:00:00.000Z" },
    ],
    nameHistory: [{ name: "Foo", changedOn: "2024-01-05T10:00:00.000Z" }],
    ...overrides,
  }
}
