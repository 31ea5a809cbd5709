/**
 * Redaction of credentials that can leak into log lines, error messages and
 * persisted reports (service API keys, bearer tokens, URL credentials).
 */

const MAX_REDACTION_LENGTH = 50000;

export const SECRET_PATTERNS = [
  /sk-[a-zA-Z0-9]{20,1000}/g, // OpenAI-style keys
  /sk-ant-[a-zA-Z0-9_-]{10,1000}/g, // Anthropic keys
  /\beyJ[A-Za-z0-9_-]{10,10000}\.[A-Za-z0-9_-]{10,10000}\.[A-Za-z0-9_-]{10,10000}\b/g, // JWT-like
  /\bBearer\s+[A-Za-z0-9._-]{10,10000}\b/gi,
  /\bBasic\s+[A-Za-z0-9+/=]{10,10000}/gi,
  /-----BEGIN [A-Z]+(?: [A-Z]+)*-----[\s\S]{0,10000}?-----END [A-Z]+(?: [A-Z]+)*-----/g,
  /\bAKIA[0-9A-Z]{16}\b/g, // AWS access key id
  /\bAIza[0-9A-Za-z-_]{35}\b/g, // Google API key
  /\bgh[pousr]_[0-9a-zA-Z]{32,255}\b/g, // GitHub tokens
  /\b(?:Proxy-)?Authorization:\s*[^\r\n]{1,10000}/gi,
  /\bX-API-Key:\s*[^\r\n]{1,10000}/gi,
];

export const URL_CRED_PATTERN = /\/\/[^/:@]{1,256}:[^/@]{1,256}@/g;

export const SENSITIVE_NAMES = [
  /PASS(WOR)?D$/i,
  /PRIVATE_KEY$/i,
  /CLIENT_SECRET$/i,
  /AUTH(?:ORIZATION|_TOKEN|_HEADER)?$/i,
  /COOKIE/i,
  /CREDENTIAL/i,
  /(^|_)KEY$/i,
  /API_?KEY$/i,
  /TOKEN$/i,
  /SECRET$/i,
  /X-API-KEY/i,
];

export function safeTruncate(text: string): string {
  if (text.length <= MAX_REDACTION_LENGTH) {
    return text;
  }
  return text.slice(0, MAX_REDACTION_LENGTH) + "\n[... truncated for security]";
}

export function redactText(text: string): string {
  let redacted = safeTruncate(text);
  for (const pattern of SECRET_PATTERNS) {
    redacted = redacted.replace(pattern, "[REDACTED]");
  }
  return redacted.replace(URL_CRED_PATTERN, "//[REDACTED]@");
}

/**
 * Recursively redacts string values, and replaces the value of any key whose
 * name looks like a credential.
 */
export function redactObject<T>(value: T): T;
export function redactObject(value: unknown): unknown {
  if (typeof value === "string") {
    return redactText(value);
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactObject(item));
  }

  if (value && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = SENSITIVE_NAMES.some((pattern) => pattern.test(key))
        ? "[REDACTED]"
        : redactObject(entry);
    }
    return result;
  }

  return value;
}
