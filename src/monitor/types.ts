import type { EventBus } from '../kernel/event-bus.js';
import type { Logger } from '../utils/logger.js';

// ═══════════════════════════════════════════════════════════════════════════
// DOMAIN SNAPSHOT
// ═══════════════════════════════════════════════════════════════════════════

export interface Product {
  id: string;
  name: string;
  stock: number;
  /** Minimum balance configured in the ERP; null when none is set */
  minBalance: number | null;
  /** Folder chain, e.g. "Food > Dairy" */
  groupPath: string;
  expirationDate: Date | null;
}

export interface Snapshot {
  fetchedAt: Date;
  products: Product[];
}

/** The API collaborator, as seen by the scheduler. */
export interface SnapshotSource {
  fetchSnapshot(signal: AbortSignal): Promise<Snapshot>;
}

// ═══════════════════════════════════════════════════════════════════════════
// NOTIFICATIONS
// ═══════════════════════════════════════════════════════════════════════════

export type NotificationSource = 'stock' | 'expiration';
export type NotificationPriority = 'normal' | 'high';

/**
 * One alert for one entity. Built by a checker, consumed by the notifier in the
 * same cycle, never stored.
 */
export interface Notification {
  source: NotificationSource;
  /** Cache key of the entity the alert is about */
  key: string;
  group: string;
  text: string;
  priority: NotificationPriority;
}

// ═══════════════════════════════════════════════════════════════════════════
// CHECKERS
// ═══════════════════════════════════════════════════════════════════════════

export interface Checker {
  readonly name: NotificationSource;
  check(snapshot: Snapshot, now: Date): Notification[];
  /** Writes the checker's cache if it changed during the cycle */
  persist(): Promise<void>;
  purgeExpired(now: Date): number;
}

// ═══════════════════════════════════════════════════════════════════════════
// SCHEDULER
// ═══════════════════════════════════════════════════════════════════════════

export type SchedulerState = 'idle' | 'running' | 'stop_requested' | 'stopped';

export interface CycleReport {
  cycle: number;
  fetched: boolean;
  products: number;
  notifications: number;
  durationMs: number;
}

/**
 * Explicit dependencies handed to every long-lived component at construction.
 */
export interface MonitorContext {
  logger: Logger;
  events: EventBus;
  clock: () => Date;
}
