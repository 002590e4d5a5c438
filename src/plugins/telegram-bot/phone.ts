// ═══════════════════════════════════════════════════════════════════════════════
// PHONE NUMBER NORMALISATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reduce a free-form phone number to its national form.
 *
 * - Belarus: `375XXXXXXXXX` (12 digits) and `80XXXXXXXXX` (11 digits) lose the prefix
 * - Russia: `7XXXXXXXXXX` and `8XXXXXXXXXX` (11 digits) lose the leading digit
 * - a bare 9 or 10 digit number is returned as is
 *
 * Returns null for anything else.
 */
export function extractPhone(text: string): string | null {
  const digits = text.replace(/\D/g, '');

  if (digits.startsWith('375') && digits.length === 12) return digits.slice(3);
  if (digits.startsWith('80') && digits.length === 11) return digits.slice(2);
  if ((digits.startsWith('7') || digits.startsWith('8')) && digits.length === 11) return digits.slice(1);
  if (digits.length === 9 || digits.length === 10) return digits;

  return null;
}
