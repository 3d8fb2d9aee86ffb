import { z } from 'zod';
import { TransportResponse } from '../ports/driven/plugboleto-port.js';
import { Envelope, envelopeSchema, isErrorEnvelope, itemErrorSchema } from '../schemas/plugboleto-envelope.schema.js';
import { PlugBoletoError } from '../../domain/errors/plugboleto-error.js';
import { PlugBoletoErrorCode } from '../../domain/enums/plugboleto-error-code.js';

function describeIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.map(String).join('.') || '(raiz)'}: ${e.message}`).join(', ');
}

/**
 * Lê o envelope padrão de uma resposta decodificada.
 * Corpo fora do formato esperado é falha de transporte.
 */
export function readEnvelope(response: TransportResponse): Envelope {
  const parsed = envelopeSchema.safeParse(response.body);
  if (!parsed.success) {
    throw new PlugBoletoError(
      `Resposta inesperada da PlugBoleto (HTTP ${response.httpCode})`,
      PlugBoletoErrorCode.TRANSPORT_FAILURE,
      [describeIssues(parsed.error)],
      response.httpCode
    );
  }
  return parsed.data;
}

/**
 * Valida `_dados` contra o schema do endpoint.
 */
export function readData<S extends z.ZodTypeAny>(envelope: Envelope, schema: S, httpCode?: number): z.output<S> {
  const parsed = schema.safeParse(envelope._dados);
  if (!parsed.success) {
    throw new PlugBoletoError(
      `Dados inesperados na resposta da PlugBoleto: ${envelope._mensagem}`,
      PlugBoletoErrorCode.TRANSPORT_FAILURE,
      [describeIssues(parsed.error)],
      httpCode
    );
  }
  return parsed.data;
}

export function stringifyReason(reason: unknown): string {
  if (reason === undefined || reason === null) {
    return '';
  }
  return typeof reason === 'string' ? reason : JSON.stringify(reason);
}

/**
 * Extrai um campo de cada item de `_dados` quando ele é uma lista.
 * Itens sem o campo viram string vazia.
 */
export function itemizedReasons(data: unknown, field: '_erro' | 'situacao' = '_erro'): string[] {
  if (!Array.isArray(data)) {
    return [];
  }
  return data.map((item) => {
    const parsed = itemErrorSchema.safeParse(item);
    return parsed.success ? stringifyReason(parsed.data[field]) : '';
  });
}

/**
 * Garante que o envelope não é de erro; caso seja, lança com a mensagem do
 * serviço e os motivos por item.
 */
export function assertSuccess(
  envelope: Envelope,
  code: PlugBoletoErrorCode = PlugBoletoErrorCode.SUBMISSION_REJECTED,
  httpCode?: number
): Envelope {
  if (isErrorEnvelope(envelope)) {
    throw new PlugBoletoError(envelope._mensagem, code, itemizedReasons(envelope._dados), httpCode);
  }
  return envelope;
}
