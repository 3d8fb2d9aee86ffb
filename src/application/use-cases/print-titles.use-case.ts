import crypto from 'crypto';
import { PlugBoletoPort, TransportResponse } from '../ports/driven/plugboleto-port.js';
import { Scheduler } from '../ports/driven/scheduler-port.js';
import { Logger } from '../ports/driven/logger-port.js';
import { envelopeSchema, protocolDataSchema } from '../schemas/plugboleto-envelope.schema.js';
import { assertSuccess, itemizedReasons, readData, readEnvelope } from '../helpers/envelope-helpers.js';
import { pollUntilReady } from '../services/poll-until-ready.js';
import { withFixedLimit } from './query-titles.use-case.js';
import { PrintMode, PrintTarget } from '../dtos/print-request.dto.js';
import { PlugBoletoError } from '../../domain/errors/plugboleto-error.js';
import { PlugBoletoErrorCode } from '../../domain/enums/plugboleto-error-code.js';

export const PRINT_POLL_INTERVAL_MS = 1000;
export const PRINT_POLL_MAX_ATTEMPTS = 10;

/**
 * Verifica se o corpo tem a estrutura de um envelope de status/erro.
 * O PDF é identificado pela ausência dessa estrutura, não pelo content-type.
 */
export function looksLikeEnvelope(body: unknown): boolean {
  if (!Buffer.isBuffer(body)) {
    return envelopeSchema.safeParse(body).success;
  }

  const text = body.toString('utf-8').trim();
  if (!text.startsWith('{')) {
    return false;
  }

  try {
    return envelopeSchema.safeParse(JSON.parse(text)).success;
  } catch {
    return false;
  }
}

function decodeBody(response: TransportResponse): TransportResponse {
  if (!Buffer.isBuffer(response.body)) {
    return response;
  }
  try {
    return { ...response, body: JSON.parse(response.body.toString('utf-8')) };
  } catch {
    return response;
  }
}

/**
 * Use Case: Imprimir boletos em lote
 *
 * Solicita a impressão, obtém o protocolo e consulta até o PDF ficar pronto.
 */
export class PrintTitlesUseCase {
  constructor(
    private plugboleto: PlugBoletoPort,
    private scheduler: Scheduler,
    private logger: Logger
  ) {}

  async execute(target: PrintTarget, mode: PrintMode = '0', requestId: string = crypto.randomUUID()): Promise<Buffer> {
    const isIdList = Array.isArray(target);
    if ((isIdList && target.length === 0) || (!isIdList && Object.keys(target).length === 0)) {
      throw new PlugBoletoError(
        'É necessário informar o idIntegracao de pelo menos 1 (um) boleto para a impressão',
        PlugBoletoErrorCode.VALIDATION_FAILED
      );
    }

    if (isIdList && mode === '99') {
      throw new PlugBoletoError(
        'Impressão personalizada (tipo 99) exige o layout de personalização, não uma lista de boletos',
        PlugBoletoErrorCode.VALIDATION_FAILED
      );
    }

    const headers = { 'X-Request-ID': requestId };
    const payload = isIdList
      ? { Boletos: target, TipoImpressao: mode }
      : { Personalizacao: target, TipoImpressao: '99' };

    const response = await this.plugboleto.post('boletos/impressao/lote', payload, {
      params: withFixedLimit([]),
      headers,
    });
    const envelope = assertSuccess(readEnvelope(response), PlugBoletoErrorCode.SUBMISSION_REJECTED, response.httpCode);
    const { protocolo } = readData(envelope, protocolDataSchema, response.httpCode);

    this.logger.debug({ requestId, protocol: protocolo, mode: payload.TipoImpressao }, 'Impressão solicitada');

    const polled = await pollUntilReady({
      query: () => this.plugboleto.get(`boletos/impressao/lote/${protocolo}`, { decode: false, headers }),
      isDone: (current) => Buffer.isBuffer(current.body) && !looksLikeEnvelope(current.body),
      intervalMs: PRINT_POLL_INTERVAL_MS,
      initialDelayMs: PRINT_POLL_INTERVAL_MS,
      maxAttempts: PRINT_POLL_MAX_ATTEMPTS,
      scheduler: this.scheduler,
      onPending: (_current, attempt) => {
        this.logger.debug({ requestId, protocol: protocolo, attempt }, 'PDF ainda não disponível');
      },
    });

    const { body } = polled.result;
    if (polled.ready && Buffer.isBuffer(body)) {
      this.logger.info(
        { requestId, protocol: protocolo, attempts: polled.attempts, pdfSize: body.length },
        'PDF de impressão obtido'
      );
      return body;
    }

    const last = readEnvelope(decodeBody(polled.result));
    this.logger.warn({ requestId, protocol: protocolo, attempts: polled.attempts }, 'PDF não ficou pronto a tempo');

    throw new PlugBoletoError(
      last._mensagem,
      PlugBoletoErrorCode.PRINT_NOT_READY,
      itemizedReasons(last._dados, 'situacao'),
      polled.result.httpCode
    );
  }
}
