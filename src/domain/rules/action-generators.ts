import { NormalizedAction, DefaultAction, PayedAction, RejectedAction } from '../entities/normalized-action.js';
import { Occurrence, SubOccurrence, Title } from '../entities/title.js';
import { ZERO_CENTS, subtractCents } from '../value-objects/money.js';
import { toIsoDate } from '../helpers/date-helpers.js';

export const GENERATOR_NAMES = [
  'confirmed',
  'rejected',
  'payed',
  'payedReference',
  'canceled',
  'abatementCompleted',
  'abatementCanceled',
  'changeDueDate',
  'removePayed',
  'default',
  'acknowledged',
] as const;

export type GeneratorName = (typeof GENERATOR_NAMES)[number];

export interface GeneratorInput {
  title: Title;
  occurrence: Occurrence;
  /** Banco informa juros apenas como diferença entre valor pago e valor do título */
  interestFromPaidDifference: boolean;
}

export type ActionGenerator = (input: GeneratorInput) => NormalizedAction;

function copySubOccurrences(occurrence: Occurrence): SubOccurrence[] | undefined {
  if (occurrence.subOccurrences.length === 0) {
    return undefined;
  }
  return occurrence.subOccurrences.map(({ code, message }) => ({ code, message }));
}

function withSubOccurrences<A extends NormalizedAction>(action: A, occurrence: Occurrence): A {
  const occurrences = copySubOccurrences(occurrence);
  return occurrences ? { ...action, occurrences } : action;
}

export function payed({ title, interestFromPaidDifference }: GeneratorInput): PayedAction {
  const { payment } = title;
  const interestDefault = interestFromPaidDifference
    ? subtractCents(payment.paidValue, title.faceValue)
    : ZERO_CENTS;

  return {
    action: 'payed',
    data: {
      documentNumber: title.documentNumber,
      occurrenceDate: toIsoDate(payment.paidAt),
      discount: payment.discount,
      value: payment.paidValue,
      otherReceipts: ZERO_CENTS,
      interestDelay: ZERO_CENTS,
      interestDefault,
    },
  };
}

export function rejected({ title, occurrence }: GeneratorInput): RejectedAction {
  return withSubOccurrences<RejectedAction>(
    {
      action: 'rejected',
      data: {
        number: title.ourNumber,
        documentNumber: title.documentNumber,
      },
      message: `Duplicata ${title.documentNumber} rejeitada. (${occurrence.message}).`,
    },
    occurrence
  );
}

export function defaultAction({ title, occurrence }: GeneratorInput): DefaultAction {
  return withSubOccurrences<DefaultAction>(
    {
      action: 'default',
      data: {},
      message: `Movimento Duplicata ${title.documentNumber} (${occurrence.message}).`,
    },
    occurrence
  );
}

/**
 * Tabela de geradores. Cada entrada da tabela de regras bancárias aponta para
 * um nome daqui, nunca para código específico de banco.
 */
export const actionGenerators: Readonly<Record<GeneratorName, ActionGenerator>> = Object.freeze<Record<GeneratorName, ActionGenerator>>({
  confirmed: ({ title }) => ({ action: 'confirmed', data: { number: title.ourNumber } }),
  rejected,
  payed,
  payedReference: ({ title }) => ({ action: 'payed', data: { number: title.ourNumber } }),
  canceled: ({ title }) => ({ action: 'canceled', data: { number: title.ourNumber } }),
  abatementCompleted: ({ title }) => ({
    action: 'abatementCompleted',
    data: { number: title.ourNumber, discountAmount: title.payment.rebate },
  }),
  abatementCanceled: ({ title }) => ({
    action: 'abatementCanceled',
    data: { number: title.ourNumber, discountAmount: title.payment.rebate },
  }),
  changeDueDate: ({ title }) => ({
    action: 'changeDueDate',
    data: { number: title.ourNumber, dueDate: toIsoDate(title.dueDate) },
  }),
  removePayed: ({ title }) => ({
    action: 'removePayed',
    data: { number: title.ourNumber, value: title.payment.rebate },
  }),
  default: defaultAction,
  // Ocorrência informativa: nenhuma ação e nenhuma mensagem
  acknowledged: () => ({ action: 'default', data: {} }),
});
