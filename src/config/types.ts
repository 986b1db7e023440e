export interface Config {
  discord: {
    token: string;
    clientId?: string;
    guildId?: string;
    adminRoleId?: string;
  };

  db: {
    path: string;
  };

  data: {
    root: string;
    backupsDir: string;
  };

  rooms: {
    groupARoleName: string;
    groupBRoleName: string;
    groupALabel: string;
    groupBLabel: string;
    noticeRoleName?: string;
  };

  backup: {
    enabled: boolean;
    hour: number; // local time, 0-23
    retentionDays: number;
    channelId?: string;
  };

  adminLog: {
    retentionDays: number; // 0 disables the daily purge
  };
}
