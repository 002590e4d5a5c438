import type { Context } from 'grammy';
import type { CounterpartyService, RegistrationResult } from '../counterparty-service.js';

// ═══════════════════════════════════════════════════════════════════════════════
// Free text: phone number registration
// ═══════════════════════════════════════════════════════════════════════════════

export function registrationReply(result: RegistrationResult): string {
  switch (result.status) {
    case 'invalid':
      return '❌ No phone number recognised. Send it as 375291234567, 80291234567 or 291234567.';
    case 'exists':
      return `ℹ️ Number ${result.phone ?? ''} is already registered`;
    case 'created':
      return `✅ Number ${result.phone ?? ''} added`;
    case 'failed':
      return `❌ Could not add number ${result.phone ?? ''}`;
  }
}

export async function handleRegister(ctx: Context, lookup: CounterpartyService): Promise<void> {
  const text = ctx.message?.text ?? '';
  const result = await lookup.register(text);
  await ctx.reply(registrationReply(result));
}
