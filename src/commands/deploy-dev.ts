import { REST, Routes } from "discord.js";
import { cfg } from "../config/env.js";
import { commandList } from "./index.js";

const { token, clientId, guildId } = cfg.discord;

async function main(token: string, clientId: string, guildId: string) {
  const rest = new REST({ version: "10" }).setToken(token);
  const body = commandList.map((c) => c.data.toJSON());
  console.log("Registering " + body.length + " commands to guild " + guildId + "...");
  await rest.put(Routes.applicationGuildCommands(clientId, guildId), { body });
  console.log("Guild commands registered.");
}

if (!clientId || !guildId) {
  console.error("Missing env vars. Need DISCORD_TOKEN, DISCORD_CLIENT_ID, GUILD_ID");
  process.exit(1);
} else {
  main(token, clientId, guildId).catch((e) => {
    console.error(e);
    process.exit(1);
  });
}
