import crypto from 'crypto';
import { PlugBoletoPort } from '../ports/driven/plugboleto-port.js';
import { Scheduler } from '../ports/driven/scheduler-port.js';
import { Logger } from '../ports/driven/logger-port.js';
import {
  BatchFailureItem,
  BatchSuccessItem,
  batchDataSchema,
  isErrorEnvelope,
  titleListSchema,
} from '../schemas/plugboleto-envelope.schema.js';
import { itemizedReasons, readData, readEnvelope, stringifyReason } from '../helpers/envelope-helpers.js';
import { correlate, idFilterParams } from '../services/batch-correlator.js';
import { pollUntilReady } from '../services/poll-until-ready.js';
import { toTitle } from '../mappers/title.mapper.js';
import { IssuanceResult, IssueFailure, IssuedTitle, TitleIssueRequest } from '../dtos/issuance-result.dto.js';
import { advanceStatus, isFailureStatus } from '../../domain/entities/title.js';
import { composeErrorMessage } from '../../domain/errors/plugboleto-error.js';

export const DEFAULT_PAYMENT_PLACE = 'Pagável em qualquer banco até o vencimento';

/** Tempo para o serviço registrar os boletos antes da consulta de confirmação */
export const ISSUANCE_CONFIRMATION_DELAY_MS = 4000;

export function prepareForIssuance(title: TitleIssueRequest): TitleIssueRequest {
  const prepared: TitleIssueRequest = { ...title, TituloLocalPagamento: DEFAULT_PAYMENT_PLACE };
  // Credisan exige modalidade 1
  if (title.CedenteContaCodigoBanco === '089') {
    prepared.TituloModalidade = '1';
  }
  return prepared;
}

function toFailure(item: BatchFailureItem): IssueFailure {
  if (item.TituloNossoNumero !== undefined && item.TituloNumeroDocumento !== undefined) {
    return {
      integrationId: item.idintegracao,
      ourNumber: item.TituloNossoNumero,
      documentNumber: item.TituloNumeroDocumento,
      situation: 'FALHA',
      reason: JSON.stringify(item._erros ?? null),
    };
  }

  const nested = item._erro;
  const reason =
    typeof nested === 'object' && nested !== null && 'erros' in nested ? nested.erros : (nested ?? item._erros);

  return {
    integrationId: item.idintegracao,
    situation: 'FALHA',
    reason: stringifyReason(reason),
  };
}

/**
 * Use Case: Emitir boletos em lote
 *
 * Envia o lote, espera uma única vez e consulta os aceitos para confirmar a
 * emissão. A reclassificação de aceitos como falha é uma leitura de melhor
 * esforço feita uma só vez, não uma garantia de consistência: o título ainda
 * pode mudar de situação depois da consulta.
 */
export class IssueTitlesUseCase {
  constructor(
    private plugboleto: PlugBoletoPort,
    private scheduler: Scheduler,
    private logger: Logger
  ) {}

  async execute(titles: TitleIssueRequest[], requestId: string = crypto.randomUUID()): Promise<IssuanceResult> {
    const headers = { 'X-Request-ID': requestId };
    const response = await this.plugboleto.post('boletos/lote', titles.map(prepareForIssuance), { headers });
    const envelope = readEnvelope(response);

    const result: IssuanceResult = {
      status: !isErrorEnvelope(envelope),
      success: [],
      errors: [],
      unresolved: [],
    };

    const batch = batchDataSchema.safeParse(envelope._dados);
    if (!batch.success) {
      result.error = composeErrorMessage(envelope._mensagem, itemizedReasons(envelope._dados));
      this.logger.warn({ requestId, httpCode: response.httpCode }, 'Lote de boletos recusado pela PlugBoleto');
      return result;
    }

    const accepted: BatchSuccessItem[] = batch.data._sucesso ?? [];

    if (batch.data._falha) {
      result.errors = batch.data._falha.map(toFailure);
    } else if (batch.data._erro !== undefined) {
      result.error = stringifyReason(batch.data._erro);
    }

    if (accepted.length === 0) {
      this.logger.info({ requestId, failed: result.errors.length }, 'Nenhum boleto aceito no lote');
      return result;
    }

    const acceptedIds = accepted.map((item) => item.idintegracao);
    const { result: confirmation } = await pollUntilReady({
      query: () => this.plugboleto.get('boletos', { params: idFilterParams(acceptedIds), headers }),
      isDone: () => true,
      intervalMs: 0,
      maxAttempts: 1,
      initialDelayMs: ISSUANCE_CONFIRMATION_DELAY_MS,
      scheduler: this.scheduler,
    });

    const confirmationEnvelope = readEnvelope(confirmation);
    const records = isErrorEnvelope(confirmationEnvelope)
      ? []
      : readData(confirmationEnvelope, titleListSchema, confirmation.httpCode);

    if (isErrorEnvelope(confirmationEnvelope)) {
      this.logger.warn(
        { requestId, message: confirmationEnvelope._mensagem },
        'Consulta de confirmação falhou; boletos aceitos ficam sem resolução'
      );
    }

    const { resolved, unresolved } = correlate(acceptedIds, records, (record) => record.IdIntegracao);
    result.unresolved = unresolved;

    const notIssued: IssueFailure[] = [];
    for (const item of accepted) {
      const record = resolved.get(item.idintegracao);
      if (!record) {
        continue;
      }

      const title = toTitle(record);
      const status = advanceStatus('accepted', title.status);

      if (isFailureStatus(status)) {
        notIssued.push({
          integrationId: title.integrationId,
          ourNumber: record.TituloNossoNumero,
          documentNumber: record.TituloNumeroDocumento,
          situation: 'FALHA',
          reason: title.reason ?? '',
        });
        continue;
      }

      const issued: IssuedTitle = {
        integrationId: title.integrationId,
        situation: title.situation,
        status,
        digitableLine: title.digitableLine,
        barcode: title.barcode,
        documentNumber: record.TituloNumeroDocumento,
        submission: item,
      };
      result.success.push(issued);
    }

    result.errors = [...result.errors, ...notIssued];

    this.logger.info(
      {
        requestId,
        issued: result.success.length,
        failed: result.errors.length,
        unresolved: result.unresolved.length,
      },
      'Lote de boletos processado'
    );

    return result;
  }
}
