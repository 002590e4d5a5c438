import type { CacheStore } from '../../cache/cache-store.js';
import type { Logger } from '../../utils/logger.js';
import { extractPhone } from './phone.js';

// ═══════════════════════════════════════════════════════════════════════════════
// COUNTERPARTY DIRECTORY: known phone numbers, backed by a cache store
// ═══════════════════════════════════════════════════════════════════════════════

/** Record fingerprint holds the counterparty's company type. */
export class CounterpartyDirectory {
  private readonly store: CacheStore;
  private readonly logger: Logger;

  constructor(store: CacheStore, logger: Logger) {
    this.store = store;
    this.logger = logger.child({ component: 'counterparty-directory' });
  }

  get size(): number {
    return this.store.size;
  }

  has(phone: string): boolean {
    return this.store.has(phone);
  }

  companyType(phone: string): string | null {
    return this.store.get(phone)?.fingerprint ?? null;
  }

  add(phone: string, companyType: string, now: Date = new Date()): void {
    const existing = this.store.get(phone);
    this.store.put(phone, {
      firstSeen: existing?.firstSeen ?? now,
      lastAlerted: now,
      fingerprint: companyType,
    });
  }

  /**
   * Merge counterparties loaded from the API. Names that are not phone
   * numbers are ignored.
   *
   * @returns number of phones added
   */
  warm(counterparties: ReadonlyMap<string, string>, now: Date = new Date()): number {
    let added = 0;
    for (const [name, companyType] of counterparties) {
      const phone = extractPhone(name);
      if (phone === null || this.store.has(phone)) continue;
      this.add(phone, companyType, now);
      added++;
    }
    this.logger.info({ added, total: this.store.size }, 'Counterparty directory warmed');
    return added;
  }

  async persist(): Promise<void> {
    await this.store.persist();
  }
}
