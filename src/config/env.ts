import "dotenv/config";
import path from "node:path";
import type { Config } from "./types.js";
import { redactConfigSnapshot } from "./redact.js";

function req(name: string): string {
  const v = process.env[name];
  if (!v || !v.trim()) throw new Error(`Missing required env var: ${name}`);
  return v.trim();
}

function opt(name: string): string | undefined {
  const v = process.env[name];
  return v && v.trim() ? v.trim() : undefined;
}

function optInt(name: string, def: number): number {
  const v = opt(name);
  if (!v) return def;
  const n = Number(v);
  if (!Number.isInteger(n)) throw new Error(`Invalid integer for ${name}: ${v}`);
  return n;
}

function optBool(name: string, def: boolean): boolean {
  const v = opt(name);
  if (!v) return def;
  if (["1", "true", "yes", "on"].includes(v.toLowerCase())) return true;
  if (["0", "false", "no", "off"].includes(v.toLowerCase())) return false;
  throw new Error(`Invalid boolean for ${name}: ${v}`);
}

export function loadConfig(): Config {
  const dataRoot = opt("DATA_ROOT") ?? "./data";

  const backupHour = optInt("BACKUP_HOUR", 12);
  if (backupHour < 0 || backupHour > 23) {
    throw new Error(`Invalid value for BACKUP_HOUR: ${backupHour}. Expected 0-23`);
  }

  const cfg: Config = {
    discord: {
      token: req("DISCORD_TOKEN"),
      clientId: opt("DISCORD_CLIENT_ID"),
      guildId: opt("GUILD_ID"),
      adminRoleId: opt("ADMIN_ROLE_ID"),
    },

    db: {
      path: opt("DATA_DB_PATH") ?? path.join(dataRoot, "rooms.sqlite"),
    },

    data: {
      root: dataRoot,
      backupsDir: opt("DATA_BACKUPS_DIR") ?? "backups",
    },

    rooms: {
      groupARoleName: opt("GROUP_A_ROLE_NAME") ?? "Group A",
      groupBRoleName: opt("GROUP_B_ROLE_NAME") ?? "Group B",
      groupALabel: opt("GROUP_A_LABEL") ?? "Group A",
      groupBLabel: opt("GROUP_B_LABEL") ?? "Group B",
      noticeRoleName: opt("NOTICE_ROLE_NAME"),
    },

    backup: {
      enabled: optBool("BACKUP_ENABLED", true),
      hour: backupHour,
      retentionDays: optInt("BACKUP_RETENTION_DAYS", 7),
      channelId: opt("BACKUP_CHANNEL_ID"),
    },

    adminLog: {
      retentionDays: optInt("ADMIN_LOG_RETENTION_DAYS", 90),
    },
  };

  return cfg;
}

export function printConfigSnapshot(cfg: Config): void {
  const snap = redactConfigSnapshot({
    DISCORD_TOKEN: cfg.discord.token,
    DISCORD_CLIENT_ID: cfg.discord.clientId,
    GUILD_ID: cfg.discord.guildId,
    ADMIN_ROLE_ID: cfg.discord.adminRoleId,
    DATA_ROOT: cfg.data.root,
    DATA_DB_PATH: cfg.db.path,
    DATA_BACKUPS_DIR: cfg.data.backupsDir,
    GROUP_A_ROLE_NAME: cfg.rooms.groupARoleName,
    GROUP_B_ROLE_NAME: cfg.rooms.groupBRoleName,
    GROUP_A_LABEL: cfg.rooms.groupALabel,
    GROUP_B_LABEL: cfg.rooms.groupBLabel,
    NOTICE_ROLE_NAME: cfg.rooms.noticeRoleName,
    BACKUP_ENABLED: cfg.backup.enabled,
    BACKUP_HOUR: cfg.backup.hour,
    BACKUP_RETENTION_DAYS: cfg.backup.retentionDays,
    BACKUP_CHANNEL_ID: cfg.backup.channelId,
    ADMIN_LOG_RETENTION_DAYS: cfg.adminLog.retentionDays,
    // read by the logger itself
    LOG_LEVEL: opt("LOG_LEVEL") ?? "info",
    LOG_SCOPES: opt("LOG_SCOPES") ?? "",
    LOG_FORMAT: opt("LOG_FORMAT") ?? "pretty",
  });

  console.log("=== ROOMS BOT CONFIG SNAPSHOT ===");
  console.log(JSON.stringify(snap, null, 2));
  console.log("=================================");
}

export const cfg = loadConfig();
