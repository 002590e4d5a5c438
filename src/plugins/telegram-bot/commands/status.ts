import type { Context } from 'grammy';
import type { StatusSource } from '../types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// /status: API reachability and monitor progress
// ═══════════════════════════════════════════════════════════════════════════════

export async function buildStatusMessage(status: StatusSource): Promise<string> {
  const connected = await status.checkConnection();
  const last = status.lastCycle();

  const lines: string[] = ['<b>Monitor Status</b>', ''];
  lines.push(connected ? '🟢 MoySklad API: reachable' : '🔴 MoySklad API: unreachable');
  lines.push(`Scheduler: ${status.schedulerState()}`);

  if (last) {
    const outcome = last.fetched
      ? `${last.products} products, ${last.notifications} alerts`
      : 'fetch failed';
    lines.push(`Last cycle: #${last.cycle}, ${outcome}`);
  } else {
    lines.push('Last cycle: none yet');
  }

  lines.push(`Known phones: ${status.knownPhones()}`);
  return lines.join('\n');
}

export async function handleStatus(ctx: Context, status: StatusSource): Promise<void> {
  await ctx.reply(await buildStatusMessage(status), { parse_mode: 'HTML' });
}
