export type PlayerId = string;

export type ApiError = {
  error: string;
  message?: string;
  status?: number;
};

export type Result<T> = { ok: true; value: T } | { ok: false; error: ApiError };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });
export const fail = <T = never>(error: ApiError): Result<T> => ({
  ok: false,
  error,
});

export type MatchSummary = {
  match_id?: string;
  started_at?: number;
};

export type MatchHistoryPage = {
  items: MatchSummary[];
  start?: number;
  end?: number;
};

export type PlayerStats = Record<string, string>;

export type MatchPlayer = {
  player_id?: string;
  nickname?: string;
  player_stats: PlayerStats;
};

export type MatchTeam = {
  team_id?: string;
  players: MatchPlayer[];
};

export type MatchRound = {
  round_stats: { Map?: string; Score?: string };
  teams: MatchTeam[];
};

export type MatchDetail = {
  rounds: MatchRound[];
};

// Column order of the spreadsheet
export const EXPORT_COLUMNS = [
  "Nickname",
  "Match ID",
  "Date",
  "Map",
  "Score",
  "Kills",
  "Deaths",
  "Assists",
  "K/D Ratio",
  "Headshots %",
  "MVPs",
  "Result",
] as const;

export type ExportColumn = (typeof EXPORT_COLUMNS)[number];

export type ExportRecord = Record<ExportColumn, string>;

export type ExportSummary = {
  success: string;
  file: string;
  count: number;
};
