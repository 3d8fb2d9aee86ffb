import crypto from 'crypto';
import { PlugBoletoPort } from '../ports/driven/plugboleto-port.js';
import { Scheduler } from '../ports/driven/scheduler-port.js';
import { Logger } from '../ports/driven/logger-port.js';
import {
  ReturnStatus,
  isErrorEnvelope,
  protocolDataSchema,
  returnStatusSchema,
} from '../schemas/plugboleto-envelope.schema.js';
import { assertSuccess, itemizedReasons, readData, readEnvelope } from '../helpers/envelope-helpers.js';
import { pollUntilReady } from '../services/poll-until-ready.js';
import { correlate, idFilterParams } from '../services/batch-correlator.js';
import { toTitle } from '../mappers/title.mapper.js';
import { QueryTitlesUseCase } from './query-titles.use-case.js';
import { ReturnProcessingResult, UnreconciledTitle } from '../dtos/return-processing-result.dto.js';
import { AsyncOperation, operationStatusFromSituation } from '../../domain/entities/async-operation.js';
import { ProcessedAction } from '../../domain/entities/normalized-action.js';
import { translate } from '../../domain/rules/bank-rule-table.js';
import { toIsoDateTime } from '../../domain/helpers/date-helpers.js';
import { PlugBoletoError } from '../../domain/errors/plugboleto-error.js';
import { PlugBoletoErrorCode } from '../../domain/enums/plugboleto-error-code.js';

export const RETURN_FIRST_READ_DELAY_MS = 1000;
export const RETURN_POLL_INTERVAL_MS = 2000;
export const RETURN_POLL_MAX_ATTEMPTS = 70;

function toUnreconciled(item: ReturnStatus['titulosNaoConciliados'][number]): UnreconciledTitle {
  return {
    number: item.TituloNossoNumeroOriginal ?? '',
    documentNumber: item.TituloNumeroDocumento ?? '',
    occurrences: item.Ocorrencias,
  };
}

/**
 * Use Case: Enviar e processar arquivo retorno (CNAB)
 *
 * submetido -> PROCESSANDO -> PROCESSADO, com espera limitada enquanto o
 * protocolo estiver em PROCESSANDO. Esgotadas as tentativas, segue com os
 * dados parciais e marca `timedOut`.
 */
export class ProcessReturnFileUseCase {
  constructor(
    private plugboleto: PlugBoletoPort,
    private queryTitles: QueryTitlesUseCase,
    private scheduler: Scheduler,
    private logger: Logger
  ) {}

  async execute(
    fileContent: string,
    layoutVersion: string | number,
    requestId: string = crypto.randomUUID()
  ): Promise<ReturnProcessingResult> {
    if (!fileContent || fileContent.trim() === '') {
      throw new PlugBoletoError(
        'É obrigatório o envio do conteúdo do arquivo retorno',
        PlugBoletoErrorCode.VALIDATION_FAILED
      );
    }

    const protocol = await this.submit(fileContent, requestId);

    const operation: AsyncOperation = {
      protocol,
      status: 'processing',
      pollIntervalMs: RETURN_POLL_INTERVAL_MS,
      maxAttempts: RETURN_POLL_MAX_ATTEMPTS,
      attemptsConsumed: 0,
    };

    let status = await this.readStatus(protocol, requestId, RETURN_FIRST_READ_DELAY_MS);
    operation.status = operationStatusFromSituation(status.situacao);
    this.assertNotFailed(operation, status.situacao);

    let timedOut = false;
    if (operation.status === 'processing') {
      const processed = status.processados;
      const polled = await pollUntilReady({
        query: () => this.readStatus(protocol, requestId, 0, processed),
        isDone: (current) => operationStatusFromSituation(current.situacao) !== 'processing',
        intervalMs: operation.pollIntervalMs,
        initialDelayMs: operation.pollIntervalMs,
        maxAttempts: operation.maxAttempts,
        scheduler: this.scheduler,
      });

      status = polled.result;
      operation.attemptsConsumed = polled.attempts;
      operation.status = operationStatusFromSituation(status.situacao);
      timedOut = !polled.ready;
      this.assertNotFailed(operation, status.situacao);

      if (timedOut) {
        this.logger.warn(
          { requestId, protocol, attempts: polled.attempts, processados: status.processados },
          'Retorno ainda em processamento após todas as tentativas; seguindo com dados parciais'
        );
      }
    }

    const result: ReturnProcessingResult = {
      protocol,
      timedOut,
      titles: new Map(),
      unreconciled: status.titulosNaoConciliados.map(toUnreconciled),
      unresolved: [],
    };

    const ids = status.titulos.map((item) => item.idIntegracao);
    for (const id of ids) {
      result.titles.set(id, []);
    }

    if (ids.length > 0) {
      const records = await this.queryTitles.execute(idFilterParams(ids), requestId);
      const { resolved, unresolved } = correlate(ids, records, (record) => record.IdIntegracao);
      result.unresolved = unresolved;

      for (const [id, record] of resolved) {
        const title = toTitle(record);
        const actions: ProcessedAction[] = title.occurrences.map((occurrence) => ({
          ...translate(title.bankCode, layoutVersion, occurrence, title),
          code: occurrence.code,
          date: toIsoDateTime(occurrence.timestamp),
        }));
        result.titles.set(id, actions);
      }
    }

    this.logger.info(
      {
        requestId,
        protocol,
        status: operation.status,
        attempts: operation.attemptsConsumed,
        titles: result.titles.size,
        unreconciled: result.unreconciled.length,
        unresolved: result.unresolved.length,
      },
      'Arquivo retorno processado'
    );

    return result;
  }

  private assertNotFailed(operation: AsyncOperation, situation: string): void {
    if (operation.status === 'error') {
      throw new PlugBoletoError(
        `Arquivo retorno não processado (protocolo ${operation.protocol})`,
        PlugBoletoErrorCode.PROCESSING_FAILED,
        [`Situação: ${situation}`]
      );
    }
  }

  private async submit(fileContent: string, requestId: string): Promise<string> {
    const headers = { 'X-Request-ID': requestId };
    const response = this.plugboleto.uploadMode
      ? await this.plugboleto.upload(
          'retornos',
          { field: 'arquivo', filename: 'retorno.ret', content: fileContent, contentType: 'text/plain' },
          { headers }
        )
      : await this.plugboleto.post('retornos', { arquivo: fileContent }, { headers });

    const envelope = assertSuccess(readEnvelope(response), PlugBoletoErrorCode.SUBMISSION_REJECTED, response.httpCode);
    const { protocolo } = readData(envelope, protocolDataSchema, response.httpCode);

    this.logger.debug({ requestId, protocol: protocolo }, 'Arquivo retorno enviado');

    return protocolo;
  }

  private async readStatus(
    protocol: string,
    requestId: string,
    delayMs: number,
    processed?: ReturnStatus['processados']
  ): Promise<ReturnStatus> {
    if (delayMs > 0) {
      await this.scheduler.sleep(delayMs);
    }

    const params = processed === undefined || processed === null ? [] : [{ name: 'limit', value: processed }];
    const response = await this.plugboleto.get(`retornos/${protocol}`, {
      params,
      headers: { 'X-Request-ID': requestId },
    });

    const envelope = readEnvelope(response);
    if (isErrorEnvelope(envelope)) {
      throw new PlugBoletoError(
        envelope._mensagem,
        PlugBoletoErrorCode.PROCESSING_FAILED,
        itemizedReasons(envelope._dados),
        response.httpCode
      );
    }

    return readData(envelope, returnStatusSchema, response.httpCode);
  }
}
