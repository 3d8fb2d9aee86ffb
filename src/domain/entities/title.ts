import { MoneyCents } from '../value-objects/money.js';

export type TitleStatus = 'pending' | 'accepted' | 'rejected' | 'paid' | 'failed';

export interface SubOccurrence {
  code: string;
  message: string;
}

/**
 * Ocorrência reportada pelo banco no arquivo retorno.
 * Criada apenas pela PlugBoleto; imutável após recebida.
 */
export interface Occurrence {
  readonly code: string;
  readonly message: string;
  /** Formato do serviço: dd/mm/aaaa HH:MM:SS */
  readonly timestamp: string;
  readonly subOccurrences: readonly SubOccurrence[];
}

export interface TitlePayment {
  readonly paidValue: MoneyCents;
  readonly discount: MoneyCents;
  readonly rebate: MoneyCents;
  /** Formato do serviço: dd/mm/aaaa [HH:MM:SS] */
  readonly paidAt: string;
}

/**
 * Título (boleto) conforme consultado na PlugBoleto.
 *
 * `integrationId` é a única chave de correlação entre o envio e as consultas
 * posteriores e nunca muda.
 */
export interface Title {
  readonly integrationId: string;
  readonly documentNumber: string;
  readonly ourNumber: string;
  readonly faceValue: MoneyCents;
  /** aaaa-mm-dd */
  readonly dueDate: string;
  readonly bankCode: string;
  readonly status: TitleStatus;
  /** Situação exatamente como retornada pelo serviço (ex.: EMITIDO, LIQUIDADO) */
  readonly situation: string;
  readonly reason?: string;
  readonly digitableLine?: string;
  readonly barcode?: string;
  readonly payment: TitlePayment;
  readonly occurrences: readonly Occurrence[];
}

const SITUATION_STATUS: Record<string, TitleStatus> = {
  SALVO: 'pending',
  PENDENTE: 'pending',
  EMITIDO: 'accepted',
  REGISTRADO: 'accepted',
  BAIXADO: 'accepted',
  LIQUIDADO: 'paid',
  PAGO: 'paid',
  REJEITADO: 'rejected',
  FALHA: 'failed',
};

export function statusFromSituation(situation: string | null | undefined): TitleStatus {
  if (!situation) {
    return 'pending';
  }
  return SITUATION_STATUS[situation.trim().toUpperCase()] ?? 'pending';
}

const ALLOWED_TRANSITIONS: Record<TitleStatus, readonly TitleStatus[]> = {
  pending: ['accepted', 'rejected', 'failed', 'paid'],
  accepted: ['paid', 'rejected', 'failed'],
  failed: ['accepted', 'paid'],
  rejected: [],
  paid: [],
};

export function canTransition(from: TitleStatus, to: TitleStatus): boolean {
  return from === to || ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Aplica a transição apenas quando permitida; caso contrário mantém o status atual.
 * `paid` e `rejected` são terminais.
 */
export function advanceStatus(current: TitleStatus, next: TitleStatus): TitleStatus {
  return canTransition(current, next) ? next : current;
}

export function isFailureStatus(status: TitleStatus): boolean {
  return status === 'rejected' || status === 'failed';
}
