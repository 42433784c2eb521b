import { writeFile } from "node:fs/promises";
import path from "node:path";
import ExcelJS from "exceljs";
import { stringify } from "csv-stringify/sync";
import { EXPORT_COLUMNS, type ExportRecord } from "./types";

export type ExportFormat = "xlsx" | "csv";

export const EXPORT_FORMATS: readonly ExportFormat[] = ["xlsx", "csv"];

export function exportFileName(
  nickname: string,
  format: ExportFormat,
  outDir = ".",
): string {
  return path.join(outDir, `${nickname}'s faceit_games.${format}`);
}

export async function writeXlsx(
  file: string,
  records: ExportRecord[],
): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet("Matches");
  sheet.columns = EXPORT_COLUMNS.map((key) => ({ header: key, key }));
  sheet.addRows(records);
  await workbook.xlsx.writeFile(file);
}

export async function writeCsv(
  file: string,
  records: ExportRecord[],
): Promise<void> {
  const csv = stringify(records, { header: true, columns: [...EXPORT_COLUMNS] });
  await writeFile(file, csv);
}
