import { TitleStatus } from '../../domain/entities/title.js';

/**
 * Campos de um título a emitir, na nomenclatura da PlugBoleto.
 * Campos não listados seguem como informados.
 */
export interface TitleIssueRequest {
  CedenteContaCodigoBanco?: string;
  TituloNumeroDocumento?: string;
  TituloValor?: string;
  TituloDataVencimento?: string;
  TituloLocalPagamento?: string;
  TituloModalidade?: string;
  [field: string]: unknown;
}

export interface IssuedTitle {
  integrationId: string;
  situation: string;
  status: TitleStatus;
  digitableLine?: string;
  barcode?: string;
  documentNumber?: string;
  /** Item original de `_sucesso` */
  submission: Record<string, unknown>;
}

export interface IssueFailure {
  integrationId?: string;
  ourNumber?: string;
  documentNumber?: string;
  situation: 'FALHA';
  reason: string;
}

export interface IssuanceResult {
  /** false quando o serviço recusou o lote */
  status: boolean;
  success: IssuedTitle[];
  errors: IssueFailure[];
  /** Aceitos no envio mas ausentes da consulta de confirmação */
  unresolved: string[];
  /** Erro geral do lote, quando não há falhas por item */
  error?: string;
}
