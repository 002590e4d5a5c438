import type { CycleReport, SchedulerState } from '../../monitor/types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TELEGRAM BOT PLUGIN TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface TelegramBotConfig {
  botToken: string;
  /** Empty list allows every user */
  allowedUserIds: readonly number[];
}

/** What /status reports on. */
export interface StatusSource {
  checkConnection(): Promise<boolean>;
  schedulerState(): SchedulerState;
  lastCycle(): CycleReport | null;
  knownPhones(): number;
}
