import { readFile } from "node:fs/promises";
import { EXPORT_FORMATS, type ExportFormat } from "./exporters";
import { isDict } from "./parsers";

export type CliArgs = Record<string, string | boolean>;

export type FileConfig = Partial<{
  nickname: string;
  "game-id": string;
  "out-dir": string;
  format: string;
  debug: boolean;
}>;

export type Settings = {
  apiKey: string;
  nickname: string;
  gameId: string;
  outDir: string;
  format: ExportFormat;
  debug: boolean;
};

type Env = Record<string, string | undefined>;

export function parseArgs(argv: string[]): CliArgs {
  const out: CliArgs = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a || !a.startsWith("--")) continue;
    const key = a.slice(2);
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) {
      out[key] = true;
    } else {
      out[key] = next;
      i++;
    }
  }
  return out;
}

export async function loadConfig(path?: string): Promise<FileConfig> {
  const candidate = path ?? "faceit.config.json";
  let json: unknown;
  try {
    json = JSON.parse(await readFile(candidate, "utf8"));
  } catch {
    return {};
  }
  if (!isDict(json)) return {};
  const cfg: FileConfig = {};
  for (const key of ["nickname", "game-id", "out-dir", "format"] as const) {
    const v = json[key];
    if (typeof v === "string") cfg[key] = v;
  }
  if (typeof json.debug === "boolean") cfg.debug = json.debug;
  return cfg;
}

const pick = (...vals: (string | boolean | undefined)[]) =>
  vals.find((v): v is string => typeof v === "string" && v.trim() !== "");

const truthy = (v: string | boolean | undefined) =>
  v === true || v === "true" || v === "1";

function isExportFormat(v: string): v is ExportFormat {
  return EXPORT_FORMATS.some((f) => f === v);
}

export function resolveSettings(
  args: CliArgs,
  fileCfg: FileConfig,
  env: Env,
): Settings {
  const apiKey = (env.FACEIT_API_KEY ?? "").trim();
  if (apiKey.length < 10) {
    throw new Error(
      "FACEIT_API_KEY missing or invalid. Set it in .env (dotenv) or environment.",
    );
  }

  const nickname = pick(args["nickname"], fileCfg.nickname, env.FACEIT_NICKNAME);
  if (!nickname) {
    throw new Error("Provide --nickname (or FACEIT_NICKNAME)");
  }

  const format = pick(
    args["format"],
    fileCfg.format,
    env.FACEIT_EXPORT_FORMAT,
  ) ?? "xlsx";
  if (!isExportFormat(format)) {
    throw new Error(
      `Unknown export format "${format}", expected one of: ${EXPORT_FORMATS.join(", ")}`,
    );
  }

  return {
    apiKey,
    nickname,
    gameId:
      pick(args["game-id"], fileCfg["game-id"], env.FACEIT_GAME_ID) ?? "cs2",
    outDir: pick(args["out-dir"], fileCfg["out-dir"], env.FACEIT_OUT_DIR) ?? ".",
    format,
    debug:
      truthy(args["debug"]) ||
      fileCfg.debug === true ||
      truthy(env.FACEIT_DEBUG),
  };
}
