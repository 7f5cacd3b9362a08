// src/config.ts

export type ToolConfig = {
  btrfs: string;
  rsync: string;
  cp: string;
  mkdir: string;
};

export const DEFAULT_TOOLS: ToolConfig = {
  btrfs: "btrfs",
  rsync: "rsync",
  cp: "cp",
  mkdir: "mkdir",
};

function pick(raw: string | undefined, fallback: string): string {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : fallback;
}

// Binaries can be overridden, e.g. SNAPSHOT_MIRROR_RSYNC=/opt/rsync/bin/rsync
export function loadToolConfig(
  env: NodeJS.ProcessEnv = process.env,
): ToolConfig {
  return {
    btrfs: pick(env.SNAPSHOT_MIRROR_BTRFS, DEFAULT_TOOLS.btrfs),
    rsync: pick(env.SNAPSHOT_MIRROR_RSYNC, DEFAULT_TOOLS.rsync),
    cp: pick(env.SNAPSHOT_MIRROR_CP, DEFAULT_TOOLS.cp),
    mkdir: pick(env.SNAPSHOT_MIRROR_MKDIR, DEFAULT_TOOLS.mkdir),
  };
}
