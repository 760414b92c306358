const MIN_DIGITS = 10;
const MAX_DIGITS = 15;

/**
 * Normalizes a transport-specific address (`whatsapp:+55...`, `5511...@c.us`,
 * `+1 (555) 123-4567`) into bare digits. Returns null when the result is not a
 * plausible E.164 number.
 */
export function normalizePhone(raw: string): string | null {
  const withoutPrefix = raw.trim().replace(/^whatsapp:/i, '').replace(/@c\.us$/i, '');
  const digits = withoutPrefix.replace(/\D/g, '');

  if (digits.length < MIN_DIGITS || digits.length > MAX_DIGITS) {
    return null;
  }

  return digits;
}

export function toE164(phone: string): string {
  return phone.startsWith('+') ? phone : `+${phone}`;
}
