/**
 * Valores monetários em centavos inteiros.
 *
 * A PlugBoleto devolve valores como string em formato brasileiro ("1.234,56"),
 * às vezes em formato decimal ("1234.56") ou como número. Toda aritmética do
 * domínio acontece sobre centavos, nunca sobre ponto flutuante.
 */
export type MoneyCents = number & { readonly __brand: 'MoneyCents' };

export const ZERO_CENTS = fromCents(0);

export function fromCents(value: number): MoneyCents {
  if (!Number.isSafeInteger(value)) {
    throw new Error(`Valor em centavos inválido: ${value}`);
  }
  return value as MoneyCents;
}

/**
 * Converte um valor vindo da API em centavos.
 * Valores ausentes ou vazios viram zero.
 */
export function parseMoney(value: unknown): MoneyCents {
  if (value === undefined || value === null || value === '') {
    return ZERO_CENTS;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new Error(`Valor monetário inválido: ${value}`);
    }
    // Mesmo arredondamento da string; notação exponencial só ocorre fora da faixa de centavos
    const text = String(value);
    return parseDecimalString(/e/i.test(text) ? value.toFixed(3) : text);
  }

  if (typeof value !== 'string') {
    throw new Error(`Valor monetário inválido: ${String(value)}`);
  }

  const trimmed = value.trim().replace(/^R\$\s*/, '');
  if (trimmed === '') {
    return ZERO_CENTS;
  }

  // "1.234,56" -> "1234.56"; "1234.56" permanece
  const normalized = trimmed.includes(',')
    ? trimmed.replace(/\./g, '').replace(',', '.')
    : trimmed;

  return parseDecimalString(normalized);
}

function parseDecimalString(input: string): MoneyCents {
  const match = input.match(/^([+-]?)(\d+)(?:\.(\d*))?$/);
  if (!match) {
    throw new Error(`Valor monetário inválido: ${input}`);
  }

  const [, sign, units, fractionRaw = ''] = match;
  const fraction = fractionRaw.padEnd(3, '0');
  let cents = Number(units) * 100 + Number(fraction.slice(0, 2));
  // Arredondamento half-up na terceira casa
  if (Number(fraction[2]) >= 5) {
    cents += 1;
  }

  return fromCents(sign === '-' ? -cents : cents);
}

export function subtractCents(a: MoneyCents, b: MoneyCents): MoneyCents {
  return fromCents(a - b);
}

/**
 * Formata centavos como decimal com ponto ("5.50").
 */
export function formatCents(cents: MoneyCents): string {
  const negative = cents < 0;
  const abs = Math.abs(cents);
  const units = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, '0');
  return `${negative ? '-' : ''}${units}.${fraction}`;
}
