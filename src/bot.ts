import "dotenv/config";
import { ChannelType, Client, Events, GatewayIntentBits } from "discord.js";
import { startDailyBackupTask, stopDailyBackupTask } from "./backup/dailyBackup.js";
import { registerHandlers } from "./commands/index.js";
import { cfg, printConfigSnapshot } from "./config/env.js";
import { createAppContext, withPlatform } from "./context.js";
import { resolveBackupsDir, resolvePidPath } from "./dataPaths.js";
import { closeDatabase, openDatabase } from "./db.js";
import { describeError } from "./errors.js";
import { acquireLock, installLockCleanup } from "./pidlock.js";
import { DiscordGuildPlatform } from "./platform/discordPlatform.js";
import { onOccupancyChanged } from "./rooms/reconcile.js";
import { onRoomChannelDeleted } from "./rooms/teardown.js";
import { log } from "./utils/logger.js";

const bootLog = log.withScope("boot");
const platformLog = log.withScope("platform");

// PID lock: prevent multiple instances
const lockFile = resolvePidPath();
if (!acquireLock(lockFile)) {
  process.exit(1);
}

printConfigSnapshot(cfg);

const db = openDatabase(cfg.db.path);
const app = createAppContext(db, cfg.rooms);

const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMembers, // blacklist membership checks
    GatewayIntentBits.GuildVoiceStates, // occupancy
  ],
});

installLockCleanup(lockFile, () => {
  stopDailyBackupTask();
  client.destroy().catch((err) => bootLog.warn(`Client shutdown failed: ${describeError(err)}`));
  closeDatabase(cfg.db.path);
});

registerHandlers(client, app);

client.on(Events.VoiceStateUpdate, (oldState, newState) => {
  const channelIds = new Set([oldState.channelId, newState.channelId]);
  const ctx = withPlatform(app, new DiscordGuildPlatform(newState.guild));

  for (const channelId of channelIds) {
    if (!channelId) continue;
    // never throws; outcome already logged
    void onOccupancyChanged(ctx, { channelId });
  }
});

client.on(Events.ChannelDelete, (channel) => {
  if (channel.isDMBased()) return;
  const side = channel.type === ChannelType.GuildText ? "text" : channel.type === ChannelType.GuildVoice ? "voice" : null;
  if (!side) return;

  const ctx = withPlatform(app, new DiscordGuildPlatform(channel.guild));
  void onRoomChannelDeleted(ctx, { channelId: channel.id, side, parentId: channel.parentId });
});

async function publishBackup(filePath: string): Promise<void> {
  const channelId = cfg.backup.channelId;
  if (!channelId) return;

  const channel = await client.channels.fetch(channelId);
  if (!channel || channel.isDMBased() || !channel.isTextBased()) {
    throw new Error(`Backup channel ${channelId} is not a server text channel`);
  }
  await channel.send({ content: "📦 Daily database backup", files: [filePath] });
}

client.once(Events.ClientReady, (readyClient) => {
  bootLog.info(`Rooms bot online as ${readyClient.user.tag}`);

  if (!cfg.backup.enabled) {
    bootLog.info("Daily backup disabled (BACKUP_ENABLED=false)");
    return;
  }
  startDailyBackupTask({
    db,
    backupsDir: resolveBackupsDir({ ensureExists: true }),
    retentionDays: cfg.backup.retentionDays,
    hour: cfg.backup.hour,
    adminLogRetentionDays: cfg.adminLog.retentionDays,
    publish: publishBackup,
  });
});

client.on(Events.Error, (err) => platformLog.error(`Client error: ${describeError(err)}`));

await client.login(cfg.discord.token);
