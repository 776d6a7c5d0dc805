/** Keep one log entry on one line. */
export function sanitizeLogMessage(s: string): string {
  if (!s) return "";
  return s.replace(/\r\n|[\r\n]/g, "\\n").replace(/\t/g, "\\t").slice(0, 10000);
}

/** Redact credentials and home directories from text that ends up in logs. */
export function redactSensitiveInfo(s: string): string {
  if (!s) return "";

  let result = s;
  result = result.replace(/password[=:]\s*\S+/gi, "password=***");
  result = result.replace(/token[=:]\s*\S+/gi, "token=***");
  result = result.replace(/api[_-]?key[=:]\s*\S+/gi, "api_key=***");
  result = result.replace(/secret[=:]\s*\S+/gi, "secret=***");
  result = result.replace(/\/home\/[^/\s]+/g, "/home/***");
  result = result.replace(/\/Users\/[^/\s]+/g, "/Users/***");
  return result;
}
