import { z } from 'zod';

/**
 * Schemas do envelope de resposta da PlugBoleto.
 *
 * Toda resposta estruturada traz `_status` ("sucesso" | "erro"), `_mensagem`
 * e `_dados`. Os campos dos itens seguem a nomenclatura da API.
 */

const idSchema = z.union([z.string(), z.number()]).transform((value) => String(value));
const optionalText = z.string().nullish().transform((value) => value ?? undefined);
const moneySchema = z.union([z.string(), z.number()]).nullish();

export const envelopeSchema = z
  .object({
    _status: z.string(),
    _mensagem: z.string().nullish().transform((value) => value ?? ''),
    _dados: z.unknown().optional(),
  })
  .passthrough();

export type Envelope = z.infer<typeof envelopeSchema>;

export function isErrorEnvelope(envelope: Envelope): boolean {
  return envelope._status.trim().toLowerCase() === 'erro';
}

/** Item com `_erro` (texto ou objeto) em listas de falhas */
export const itemErrorSchema = z
  .object({
    _erro: z.unknown().optional(),
    situacao: z.string().nullish(),
  })
  .passthrough();

export const batchSuccessItemSchema = z
  .object({
    idintegracao: idSchema,
  })
  .passthrough();

export type BatchSuccessItem = z.infer<typeof batchSuccessItemSchema>;

export const batchFailureItemSchema = z
  .object({
    idintegracao: idSchema.optional(),
    TituloNossoNumero: optionalText,
    TituloNumeroDocumento: optionalText,
    _erros: z.unknown().optional(),
    _erro: z.unknown().optional(),
    _dados: z.unknown().optional(),
  })
  .passthrough();

export type BatchFailureItem = z.infer<typeof batchFailureItemSchema>;

export const batchDataSchema = z
  .object({
    _sucesso: z.array(batchSuccessItemSchema).optional(),
    _falha: z.array(batchFailureItemSchema).optional(),
    _erro: z.unknown().optional(),
  })
  .passthrough();

export const protocolDataSchema = z
  .object({
    protocolo: idSchema,
  })
  .passthrough();

export const subOccurrenceSchema = z.object({
  codigo: idSchema,
  mensagem: z.string().nullish().transform((value) => value ?? ''),
});

export const movementSchema = z.object({
  codigo: idSchema,
  mensagem: z.string().nullish().transform((value) => value ?? ''),
  data: z.string().nullish().transform((value) => value ?? ''),
  ocorrencias: z.array(subOccurrenceSchema).nullish().transform((value) => value ?? []),
});

export type Movement = z.infer<typeof movementSchema>;

/** Registro de título retornado por GET /boletos */
export const titleRecordSchema = z
  .object({
    IdIntegracao: idSchema,
    situacao: z.string().nullish().transform((value) => value ?? ''),
    motivo: optionalText,
    TituloNossoNumero: optionalText,
    TituloNumeroDocumento: optionalText,
    TituloLinhaDigitavel: optionalText,
    TituloCodigoBarras: optionalText,
    TituloValor: moneySchema,
    TituloDataVencimento: optionalText,
    CedenteCodigoBanco: optionalText,
    PagamentoValorPago: moneySchema,
    PagamentoValorDesconto: moneySchema,
    PagamentoValorAbatimento: moneySchema,
    PagamentoData: optionalText,
    TituloMovimentos: z.array(movementSchema).nullish().transform((value) => value ?? []),
  })
  .passthrough();

export type TitleRecord = z.infer<typeof titleRecordSchema>;

export const titleListSchema = z.array(titleRecordSchema);

export const unreconciledRecordSchema = z
  .object({
    TituloNossoNumeroOriginal: optionalText,
    TituloNumeroDocumento: optionalText,
    Ocorrencias: z.unknown().optional(),
  })
  .passthrough();

/** _dados de GET /retornos/{protocolo} */
export const returnStatusSchema = z
  .object({
    situacao: z.string(),
    processados: z.union([z.string(), z.number()]).nullish(),
    titulos: z.array(z.object({ idIntegracao: idSchema }).passthrough()).nullish().transform((value) => value ?? []),
    titulosNaoConciliados: z
      .array(unreconciledRecordSchema)
      .nullish()
      .transform((value) => value ?? []),
  })
  .passthrough();

export type ReturnStatus = z.infer<typeof returnStatusSchema>;

/** _dados de GET /boletos/impressao/lote/{protocolo} enquanto não há PDF */
export const printStatusItemSchema = z
  .object({
    situacao: z.string().nullish().transform((value) => value ?? ''),
  })
  .passthrough();

export const remittanceDataSchema = z
  .object({
    _sucesso: z
      .array(
        z
          .object({
            titulos: z.array(z.object({ idintegracao: idSchema }).passthrough()).nullish().transform((value) => value ?? []),
          })
          .passthrough()
      )
      .optional(),
    _falha: z
      .array(z.object({ idintegracao: idSchema.optional(), _erro: z.unknown().optional() }).passthrough())
      .optional(),
  })
  .passthrough();
