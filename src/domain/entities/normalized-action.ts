import { MoneyCents } from '../value-objects/money.js';
import { SubOccurrence } from './title.js';

export type ActionKind =
  | 'confirmed'
  | 'payed'
  | 'rejected'
  | 'canceled'
  | 'abatementCompleted'
  | 'abatementCanceled'
  | 'changeDueDate'
  | 'removePayed'
  | 'default';

interface ActionBase<K extends ActionKind, D> {
  action: K;
  data: D;
  message?: string;
  occurrences?: SubOccurrence[];
}

export interface ReferenceData {
  number: string;
}

export interface PaymentData {
  documentNumber: string;
  /** aaaa-mm-dd */
  occurrenceDate: string;
  discount: MoneyCents;
  value: MoneyCents;
  otherReceipts: MoneyCents;
  interestDelay: MoneyCents;
  interestDefault: MoneyCents;
}

export type ConfirmedAction = ActionBase<'confirmed', ReferenceData>;
export type PayedAction = ActionBase<'payed', PaymentData | ReferenceData>;
export type RejectedAction = ActionBase<'rejected', ReferenceData & { documentNumber: string }>;
export type CanceledAction = ActionBase<'canceled', ReferenceData>;
export type AbatementCompletedAction = ActionBase<'abatementCompleted', ReferenceData & { discountAmount: MoneyCents }>;
export type AbatementCanceledAction = ActionBase<'abatementCanceled', ReferenceData & { discountAmount: MoneyCents }>;
export type ChangeDueDateAction = ActionBase<'changeDueDate', ReferenceData & { dueDate: string }>;
export type RemovePayedAction = ActionBase<'removePayed', ReferenceData & { value: MoneyCents }>;
export type DefaultAction = ActionBase<'default', Record<string, never>>;

/**
 * Evento bancário normalizado, independente de banco e layout.
 */
export type NormalizedAction =
  | ConfirmedAction
  | PayedAction
  | RejectedAction
  | CanceledAction
  | AbatementCompletedAction
  | AbatementCanceledAction
  | ChangeDueDateAction
  | RemovePayedAction
  | DefaultAction;

/**
 * Ação produzida durante o processamento do retorno, com o código bruto e a
 * data da ocorrência que a originou.
 */
export type ProcessedAction = NormalizedAction & {
  code: string;
  /** aaaa-mm-dd HH:MM:SS */
  date: string;
};
