import { Occurrence, Title, statusFromSituation } from '../../domain/entities/title.js';
import { parseMoney } from '../../domain/value-objects/money.js';
import { toIsoDate } from '../../domain/helpers/date-helpers.js';
import { Movement, TitleRecord } from '../schemas/plugboleto-envelope.schema.js';

export function toOccurrence(movement: Movement): Occurrence {
  return {
    code: movement.codigo,
    message: movement.mensagem,
    timestamp: movement.data,
    subOccurrences: movement.ocorrencias.map((item) => ({ code: item.codigo, message: item.mensagem })),
  };
}

/**
 * Converte o registro da PlugBoleto no título do domínio.
 * Valores monetários passam a centavos.
 */
export function toTitle(record: TitleRecord): Title {
  return {
    integrationId: record.IdIntegracao,
    documentNumber: record.TituloNumeroDocumento ?? '',
    ourNumber: record.TituloNossoNumero ?? '',
    faceValue: parseMoney(record.TituloValor),
    dueDate: toIsoDate(record.TituloDataVencimento),
    bankCode: record.CedenteCodigoBanco ?? '',
    status: statusFromSituation(record.situacao),
    situation: record.situacao,
    reason: record.motivo,
    digitableLine: record.TituloLinhaDigitavel,
    barcode: record.TituloCodigoBarras,
    payment: {
      paidValue: parseMoney(record.PagamentoValorPago),
      discount: parseMoney(record.PagamentoValorDesconto),
      rebate: parseMoney(record.PagamentoValorAbatimento),
      paidAt: record.PagamentoData ?? '',
    },
    occurrences: record.TituloMovimentos.map(toOccurrence),
  };
}
