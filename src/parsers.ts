import type {
  ExportRecord,
  MatchDetail,
  MatchHistoryPage,
  MatchPlayer,
  MatchRound,
  MatchSummary,
  MatchTeam,
  PlayerStats,
} from "./types";

type Dict = Record<string, unknown>;

export function isDict(v: unknown): v is Dict {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

// Stats payloads carry lists either as arrays or as id-keyed objects
export function extractEntries(v: unknown): unknown[] {
  if (Array.isArray(v)) return v;
  if (isDict(v)) return Object.values(v);
  return [];
}

function str(v: unknown): string | undefined {
  if (typeof v === "string") return v;
  if (typeof v === "number" && Number.isFinite(v)) return String(v);
  return undefined;
}

function num(v: unknown): number | undefined {
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

function toSummary(v: unknown): MatchSummary {
  if (!isDict(v)) return {};
  return { match_id: str(v.match_id), started_at: num(v.started_at) };
}

export function toMatchHistoryPage(body: unknown): MatchHistoryPage {
  if (!isDict(body)) return { items: [] };
  return {
    items: extractEntries(body.items).map(toSummary),
    start: num(body.start),
    end: num(body.end),
  };
}

function toStats(v: unknown): PlayerStats {
  const out: PlayerStats = {};
  if (!isDict(v)) return out;
  for (const [k, raw] of Object.entries(v)) {
    const s = str(raw);
    if (s !== undefined) out[k] = s;
  }
  return out;
}

function toPlayer(v: unknown): MatchPlayer {
  if (!isDict(v)) return { player_stats: {} };
  return {
    player_id: str(v.player_id),
    nickname: str(v.nickname),
    player_stats: toStats(v.player_stats),
  };
}

function toTeam(v: unknown): MatchTeam {
  if (!isDict(v)) return { players: [] };
  return {
    team_id: str(v.team_id),
    players: extractEntries(v.players).map(toPlayer),
  };
}

function toRound(v: unknown): MatchRound {
  if (!isDict(v)) return { round_stats: {}, teams: [] };
  const rs: Dict = isDict(v.round_stats) ? v.round_stats : {};
  return {
    round_stats: { Map: str(rs.Map), Score: str(rs.Score) },
    teams: extractEntries(v.teams).map(toTeam),
  };
}

export function toMatchDetail(body: unknown): MatchDetail {
  if (!isDict(body)) return { rounds: [] };
  return { rounds: extractEntries(body.rounds).map(toRound) };
}

/**
 * Stats of `playerId` in the first round of a match. The first player entry
 * with that id wins; an entry with an empty stats object counts as missing.
 */
export function findPlayerStats(
  detail: MatchDetail,
  playerId: string,
): PlayerStats | undefined {
  const round = detail.rounds[0];
  if (!round) return undefined;
  for (const team of round.teams) {
    const player = team.players.find((p) => p.player_id === playerId);
    if (!player) continue;
    return Object.keys(player.player_stats).length > 0
      ? player.player_stats
      : undefined;
  }
  return undefined;
}

// Unix seconds → "YYYY-MM-DD HH:MM:SS" (UTC)
export function formatMatchDate(startedAt: number): string {
  return new Date(startedAt * 1000).toISOString().slice(0, 19).replace("T", " ");
}

export function buildExportRecord(input: {
  nickname: string;
  matchId: string;
  startedAt: number;
  detail: MatchDetail;
  stats: PlayerStats;
}): ExportRecord {
  const { stats } = input;
  const roundStats = input.detail.rounds[0]?.round_stats ?? {};
  return {
    Nickname: input.nickname,
    "Match ID": input.matchId,
    Date: formatMatchDate(input.startedAt),
    Map: roundStats.Map ?? "N/A",
    Score: roundStats.Score ?? "N/A",
    Kills: stats["Kills"] ?? "0",
    Deaths: stats["Deaths"] ?? "0",
    Assists: stats["Assists"] ?? "0",
    "K/D Ratio": stats["K/D Ratio"] ?? "0",
    "Headshots %": stats["Headshots %"] ?? "0",
    MVPs: stats["MVPs"] ?? "0",
    Result: stats["Result"] ?? "N/A",
  };
}
