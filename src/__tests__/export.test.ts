import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import ExcelJS from "exceljs";
import { StatsClient } from "../stats-client";
import type { ExportRecord } from "../types";

const record: ExportRecord = {
  Nickname: "nick",
  "Match ID": "M2",
  Date: "2023-11-14 22:13:20",
  Map: "de_mirage",
  Score: "13 / 9",
  Kills: "21",
  Deaths: "12",
  Assists: "4",
  "K/D Ratio": "1.75",
  "Headshots %": "48",
  MVPs: "3",
  Result: "1",
};

describe("export", () => {
  const client = new StatsClient({ apiKey: "test-secret" });
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "faceit-export-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("refuses an empty collection and writes nothing", async () => {
    await expect(client.exportToExcel([], "nick", dir)).resolves.toEqual({
      ok: false,
      error: { error: "No matches to export" },
    });
    await expect(readdir(dir)).resolves.toEqual([]);
  });

  it("writes one worksheet row per record", async () => {
    const second = { ...record, "Match ID": "M3", Kills: "8" };
    const res = await client.exportToExcel([record, second], "nick", dir);

    const file = path.join(dir, "nick's faceit_games.xlsx");
    expect(res).toEqual({
      ok: true,
      value: {
        success: `Exported 2 matches to ${file}`,
        file,
        count: 2,
      },
    });

    const wb = new ExcelJS.Workbook();
    await wb.xlsx.readFile(file);
    const sheet = wb.getWorksheet("Matches");
    expect(sheet?.rowCount).toBe(3);
    expect(sheet?.getCell("A1").value).toBe("Nickname");
    expect(sheet?.getCell("L1").value).toBe("Result");
    expect(sheet?.getCell("B2").value).toBe("M2");
    expect(sheet?.getCell("F3").value).toBe("8");
  });

  it("writes a csv with a header row", async () => {
    const res = await client.exportToCsv([record], "nick", dir);

    const file = path.join(dir, "nick's faceit_games.csv");
    expect(res.ok && res.value.success).toBe(`Exported 1 matches to ${file}`);
    await expect(readFile(file, "utf8")).resolves.toBe(
      "Nickname,Match ID,Date,Map,Score,Kills,Deaths,Assists,K/D Ratio,Headshots %,MVPs,Result\n" +
        "nick,M2,2023-11-14 22:13:20,de_mirage,13 / 9,21,12,4,1.75,48,3,1\n",
    );
  });

  it("reports a failed write as an export error", async () => {
    const res = await client.exportToExcel(
      [record],
      "nick",
      path.join(dir, "missing", "dir"),
    );
    expect(res.ok).toBe(false);
    expect(!res.ok && res.error.error).toBe("Export error");
    expect(!res.ok && res.error.message).toMatch(/ENOENT/);
  });
});
