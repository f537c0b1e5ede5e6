// Environment-driven settings shared by the CLI and the diagnostics helpers

export interface Settings {
  /** System dictionary CSV the synthesized entries are derived from */
  sysdicPath?: string;
  /** Sentences submitted to the parser per batch */
  batchSize: number;
  debug: boolean;
  profile: boolean;
}

export const DEFAULT_BATCH_SIZE = 32;

export function isTruthyFlag(value: string | undefined): boolean {
  return value === '1' || value === 'true';
}

export function getSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): Settings {
  const settings: Settings = {
    batchSize: DEFAULT_BATCH_SIZE,
    debug: isTruthyFlag(env.ABC_DEBUG),
    profile: isTruthyFlag(env.ABC_PROFILE),
  };

  const sysdicPath = env.ABC_SYSDIC_PATH?.trim();
  if (sysdicPath) {
    settings.sysdicPath = sysdicPath;
  }

  const batchSize = env.ABC_BATCH_SIZE?.trim();
  if (batchSize) {
    settings.batchSize = parseBatchSize(batchSize, 'ABC_BATCH_SIZE');
  }

  return settings;
}

export function parseBatchSize(value: string, source: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`Invalid ${source}: ${value} (expected a positive integer)`);
  }
  return parsed;
}
