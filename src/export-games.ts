import "dotenv/config";
import { mkdir } from "node:fs/promises";
import { loadConfig, parseArgs, resolveSettings } from "./config";
import { StatsClient } from "./stats-client";

(async () => {
  const args = parseArgs(process.argv.slice(2));
  const fileCfg = await loadConfig(
    typeof args.config === "string" ? args.config : undefined,
  );
  const settings = resolveSettings(args, fileCfg, process.env);

  const client = new StatsClient({
    apiKey: settings.apiKey,
    debug: settings.debug,
  });

  const player = await client.findPlayerId(settings.nickname);
  if (!player.ok) {
    console.error("Player Search Error:", JSON.stringify(player.error, null, 2));
    process.exit(1);
  }
  const playerId = player.value;
  if (!playerId) {
    console.error(`Player not found by nickname: ${settings.nickname}`);
    process.exit(1);
  }
  console.log(`Found Player ID: ${playerId}`);

  const games = await client.fetchGames(
    playerId,
    settings.gameId,
    settings.nickname,
  );
  if (!games.ok) {
    console.error("Match Fetch Error:", JSON.stringify(games.error, null, 2));
    process.exit(1);
  }

  await mkdir(settings.outDir, { recursive: true });
  const exported = await client.exportAs(
    settings.format,
    games.value,
    settings.nickname,
    settings.outDir,
  );
  console.log(
    JSON.stringify(exported.ok ? exported.value : exported.error, null, 2),
  );
})().catch((e) => {
  console.error(e);
  process.exit(1);
});
