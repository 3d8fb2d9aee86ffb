/**
 * Sanitização de contexto de log
 *
 * Remove credenciais da PlugBoleto e mascara CNPJ/CPF antes de qualquer
 * registro. Não muta o objeto original.
 */

const SENSITIVE_KEYS = new Set([
  'token-sh',
  'tokensh',
  'token_sh',
  'plugboletotokensh',
  'token',
  'authorization',
  'password',
  'senha',
  'secret',
]);

const CNPJ_KEYS = new Set(['cnpj-sh', 'cnpj-cedente', 'cnpjsh', 'cnpjcedente', 'cedentecpfcnpj', 'sacadocpfcnpj']);

const MAX_DEPTH = 6;

/**
 * Mantém apenas os 4 últimos dígitos: "12345678000190" -> "**********0190"
 */
export function maskDocument(value: string): string {
  const digits = value.replace(/\D/g, '');
  if (digits.length <= 4) {
    return '*'.repeat(digits.length);
  }
  return `${'*'.repeat(digits.length - 4)}${digits.slice(-4)}`;
}

function sanitizeValue(key: string, value: unknown, depth: number): unknown {
  const lowerKey = key.toLowerCase();

  if (SENSITIVE_KEYS.has(lowerKey)) {
    return '[REDACTED]';
  }

  if (CNPJ_KEYS.has(lowerKey) && typeof value === 'string') {
    return maskDocument(value);
  }

  if (Buffer.isBuffer(value)) {
    return `[Buffer ${value.length} bytes]`;
  }

  if (Array.isArray(value)) {
    return depth >= MAX_DEPTH ? '[Array]' : value.map((item) => sanitizeValue('', item, depth + 1));
  }

  if (typeof value === 'object' && value !== null && !(value instanceof Error) && !(value instanceof Date)) {
    return depth >= MAX_DEPTH ? '[Object]' : sanitizeRecord(Object.entries(value), depth + 1);
  }

  return value;
}

function sanitizeRecord(entries: [string, unknown][], depth: number): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of entries) {
    sanitized[key] = sanitizeValue(key, value, depth);
  }
  return sanitized;
}

export function sanitizeForLogs(obj: Record<string, unknown>): Record<string, unknown> {
  return sanitizeRecord(Object.entries(obj), 0);
}
