import {
  exportFileName,
  writeCsv,
  writeXlsx,
  type ExportFormat,
} from "./exporters";
import {
  buildExportRecord,
  findPlayerStats,
  isDict,
  toMatchDetail,
  toMatchHistoryPage,
} from "./parsers";
import {
  fail,
  ok,
  type ExportRecord,
  type ExportSummary,
  type MatchDetail,
  type MatchHistoryPage,
  type PlayerId,
  type Result,
} from "./types";

export const FACEIT_BASE = "https://open.faceit.com/data/v4";

// Export window, Unix seconds, inclusive
export const WINDOW_FROM = Date.UTC(2025, 5, 1, 0, 0, 0) / 1000;
export const WINDOW_TO = Date.UTC(2025, 11, 31, 23, 59, 59) / 1000;

export const PAGE_LIMIT = 100;

const sleep = (ms: number) => new Promise<void>((res) => setTimeout(res, ms));

export type StatsClientOptions = {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  pageDelayMs?: number;
  debug?: boolean;
  sleep?: (ms: number) => Promise<void>;
};

type ClientConfig = Readonly<{
  baseUrl: string;
  headers: Readonly<Record<string, string>>;
  timeoutMs: number;
  pageDelayMs: number;
  debug: boolean;
}>;

type Labels = { status: string; transport: string };

export class StatsClient {
  private readonly config: ClientConfig;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(opts: StatsClientOptions) {
    this.config = Object.freeze({
      baseUrl: opts.baseUrl ?? FACEIT_BASE,
      headers: Object.freeze({
        Authorization: `Bearer ${opts.apiKey}`,
        Accept: "application/json",
      }),
      timeoutMs: opts.timeoutMs ?? 10_000,
      pageDelayMs: opts.pageDelayMs ?? 1000,
      debug: opts.debug ?? false,
    });
    this.sleep = opts.sleep ?? sleep;
  }

  private async get(u: URL, labels: Labels): Promise<Result<unknown>> {
    if (this.config.debug) console.log(`GET ${u.toString()}`);
    try {
      const r = await fetch(u.toString(), {
        headers: this.config.headers,
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
      if (r.status !== 200) {
        return fail({
          error: `${labels.status} failed with status ${r.status}`,
          message: await r.text(),
          status: r.status,
        });
      }
      const body: unknown = await r.json();
      return ok(body);
    } catch (e) {
      return fail({
        error: labels.transport,
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }

  async findPlayerId(
    nickname: string,
  ): Promise<Result<PlayerId | undefined>> {
    const u = new URL(`${this.config.baseUrl}/players`);
    u.searchParams.set("nickname", nickname);
    const res = await this.get(u, {
      status: "Player search",
      transport: "Player search error",
    });
    if (!res.ok) return res;
    const id = isDict(res.value) ? res.value.player_id : undefined;
    return ok(typeof id === "string" ? id : undefined);
  }

  async getMatchHistory(
    playerId: PlayerId,
    gameId: string,
    fromTs: number,
    toTs: number,
    offset = 0,
    limit = PAGE_LIMIT,
  ): Promise<Result<MatchHistoryPage>> {
    const u = new URL(
      `${this.config.baseUrl}/players/${encodeURIComponent(playerId)}/history`,
    );
    u.searchParams.set("game", gameId);
    u.searchParams.set("from", String(fromTs));
    u.searchParams.set("to", String(toTs));
    u.searchParams.set("offset", String(offset));
    u.searchParams.set("limit", String(limit));
    // debug mode logs every request URL already
    if (!this.config.debug) {
      console.log(`Requesting match history: ${u.toString()}`);
    }
    const res = await this.get(u, {
      status: "Match history request",
      transport: "Request error",
    });
    return res.ok ? ok(toMatchHistoryPage(res.value)) : res;
  }

  async getMatchStats(matchId: string): Promise<Result<MatchDetail>> {
    const u = new URL(
      `${this.config.baseUrl}/matches/${encodeURIComponent(matchId)}/stats`,
    );
    const res = await this.get(u, {
      status: "Match stats request",
      transport: "Request error",
    });
    return res.ok ? ok(toMatchDetail(res.value)) : res;
  }

  /**
   * Walks the player's history for the export window page by page and
   * collects one record per match in which the player's stats were found.
   *
   * A failed history page aborts the run and drops what was collected so
   * far; a failed match lookup only skips that match.
   */
  async fetchGames(
    playerId: PlayerId,
    gameId: string,
    nickname: string,
  ): Promise<Result<ExportRecord[]>> {
    const records: ExportRecord[] = [];
    for (let offset = 0; ; offset += PAGE_LIMIT) {
      const page = await this.getMatchHistory(
        playerId,
        gameId,
        WINDOW_FROM,
        WINDOW_TO,
        offset,
        PAGE_LIMIT,
      );
      if (!page.ok) return page;
      const matches = page.value.items;
      if (matches.length === 0) break;

      console.log(`Fetched ${matches.length} matches (offset: ${offset})`);

      for (const m of matches) {
        const matchId = m.match_id;
        const startedAt = m.started_at;
        if (!matchId || !startedAt) {
          console.warn(
            `Skipping match without id or start time: ${matchId ?? "(no id)"} (offset: ${offset})`,
          );
          continue;
        }

        const detail = await this.getMatchStats(matchId);
        if (!detail.ok) {
          console.warn(
            `Skipping match ${matchId}: ${detail.error.message ?? detail.error.error}`,
          );
          continue;
        }

        const stats = findPlayerStats(detail.value, playerId);
        if (!stats) {
          console.warn(`No stats found for player in match ${matchId}`);
          continue;
        }

        records.push(
          buildExportRecord({
            nickname,
            matchId,
            startedAt,
            detail: detail.value,
            stats,
          }),
        );
      }

      await this.sleep(this.config.pageDelayMs);
    }
    return ok(records);
  }

  exportToExcel(
    records: ExportRecord[],
    nickname: string,
    outDir = ".",
  ): Promise<Result<ExportSummary>> {
    return this.exportAs("xlsx", records, nickname, outDir);
  }

  exportToCsv(
    records: ExportRecord[],
    nickname: string,
    outDir = ".",
  ): Promise<Result<ExportSummary>> {
    return this.exportAs("csv", records, nickname, outDir);
  }

  async exportAs(
    format: ExportFormat,
    records: ExportRecord[],
    nickname: string,
    outDir = ".",
  ): Promise<Result<ExportSummary>> {
    if (records.length === 0) return fail({ error: "No matches to export" });
    const file = exportFileName(nickname, format, outDir);
    try {
      if (format === "xlsx") await writeXlsx(file, records);
      else await writeCsv(file, records);
    } catch (e) {
      return fail({
        error: "Export error",
        message: e instanceof Error ? e.message : String(e),
      });
    }
    return ok({
      success: `Exported ${records.length} matches to ${file}`,
      file,
      count: records.length,
    });
  }
}
