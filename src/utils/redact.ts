/**
 * Redaction Utility
 *
 * Webhook payloads carry customer emails and names. Anything that ends up in a log line
 * goes through these helpers first.
 */

/**
 * Redact email addresses, preserving domain for debugging
 * Example: "user@example.com" → "***@example.com"
 */
export function redactEmail(email: string | null | undefined): string {
  if (!email) return '';

  const parts = email.split('@');
  if (parts.length !== 2) return '***';

  return `***@${parts[1]}`;
}

/**
 * Redact sensitive data from a string: Stripe keys, webhook secrets, bot tokens, emails
 */
export function redactString(input: string): string {
  let result = input;

  result = result.replace(/sk_(test|live)_[a-zA-Z0-9]+/g, 'sk_***');
  result = result.replace(/whsec_[a-zA-Z0-9]+/g, 'whsec_***');
  // Telegram bot tokens appear in API URLs: /bot<id>:<secret>/
  result = result.replace(/bot\d+:[A-Za-z0-9_-]+/g, 'bot***');
  result = result.replace(/\b[a-zA-Z0-9._%+-]+@([a-zA-Z0-9.-]+\.[a-zA-Z]{2,})\b/g, '***@$1');

  return result;
}

const SECRET_KEY_PATTERN = /(secret|token|password|apikey|api_key|authorization)/i;
const PERSONAL_KEY_PATTERN = /(email|name|phone)/i;

/**
 * Redact sensitive fields from an object for logging
 */
export function redactObject(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redactObject);
  }

  if (!value || typeof value !== 'object') {
    return typeof value === 'string' ? redactString(value) : value;
  }

  const redacted: Record<string, unknown> = {};

  for (const [key, field] of Object.entries(value)) {
    if (SECRET_KEY_PATTERN.test(key)) {
      redacted[key] = '***';
    } else if (PERSONAL_KEY_PATTERN.test(key) && typeof field === 'string') {
      redacted[key] = key.toLowerCase().includes('email') ? redactEmail(field) : '***';
    } else {
      redacted[key] = redactObject(field);
    }
  }

  return redacted;
}
