import { readFileSync } from 'fs';
import { z } from 'zod';
import { NormalizedAction } from '../entities/normalized-action.js';
import { Occurrence, Title } from '../entities/title.js';
import { GENERATOR_NAMES, GeneratorName, actionGenerators } from './action-generators.js';

export type ReturnLayout = '240' | '400';

const bankRulesSchema = z.record(
  z.string().regex(/^\d{3}$/),
  z.object({
    name: z.string(),
    interestFromPaidDifference: z.boolean(),
    layouts: z.record(
      z.enum(['240', '400']),
      z.record(z.string().regex(/^\d{2}$/), z.enum(GENERATOR_NAMES))
    ),
  })
);

export type BankRules = z.infer<typeof bankRulesSchema>;
export type BankProfile = BankRules[string];

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

export function loadBankRules(
  source: URL = new URL('./bank-occurrence-rules.json', import.meta.url)
): BankRules {
  const raw: unknown = JSON.parse(readFileSync(source, 'utf-8'));
  const parsed = bankRulesSchema.safeParse(raw);
  if (!parsed.success) {
    const invalid = parsed.error.errors.map((e) => e.path.map(String).join('.')).join(', ');
    throw new Error(`Tabela de ocorrências bancárias inválida: ${invalid}`);
  }
  return deepFreeze(parsed.data);
}

/**
 * Tabela de regras por banco, carregada uma vez e somente leitura.
 */
export const BANK_RULES: Readonly<BankRules> = loadBankRules();

/**
 * Qualquer layout diferente de 400 usa a tabela CNAB 240.
 */
export function normalizeLayout(layoutVersion: string | number): ReturnLayout {
  return String(layoutVersion).trim() === '400' ? '400' : '240';
}

export function resolveGenerator(
  bankId: string,
  layoutVersion: string | number,
  code: string,
  rules: Readonly<BankRules> = BANK_RULES
): GeneratorName {
  const layout = rules[bankId]?.layouts[normalizeLayout(layoutVersion)];
  return layout?.[code] ?? 'default';
}

export function supportedBanks(rules: Readonly<BankRules> = BANK_RULES): string[] {
  return Object.keys(rules).sort();
}

/**
 * Traduz uma ocorrência bancária em uma ação normalizada.
 *
 * Banco, layout ou código sem regra caem no gerador `default`; nunca lança.
 */
export function translate(
  bankId: string,
  layoutVersion: string | number,
  occurrence: Occurrence,
  title: Title,
  rules: Readonly<BankRules> = BANK_RULES
): NormalizedAction {
  const generator = resolveGenerator(bankId, layoutVersion, occurrence.code, rules);
  return actionGenerators[generator]({
    title,
    occurrence,
    interestFromPaidDifference: rules[bankId]?.interestFromPaidDifference ?? false,
  });
}
