import { PlugBoletoPort } from '../ports/driven/plugboleto-port.js';
import { CommandResult } from '../dtos/remittance-result.dto.js';
import { assertSuccess, readEnvelope } from './envelope-helpers.js';
import { withFixedLimit } from '../use-cases/query-titles.use-case.js';
import { PlugBoletoError } from '../../domain/errors/plugboleto-error.js';
import { PlugBoletoErrorCode } from '../../domain/enums/plugboleto-error-code.js';

export function requireIds(ids: readonly string[], operation: string): void {
  if (ids.length === 0) {
    throw new PlugBoletoError(
      `É necessário informar o idIntegracao de pelo menos 1 (um) boleto para ${operation}`,
      PlugBoletoErrorCode.VALIDATION_FAILED
    );
  }
}

/**
 * POST de um comando em lote sobre ids de integração.
 * Envelope de erro vira PlugBoletoError com os motivos por item.
 */
export async function sendBatchCommand(
  plugboleto: PlugBoletoPort,
  path: string,
  ids: readonly string[],
  requestId: string
): Promise<CommandResult> {
  const response = await plugboleto.post(path, ids, {
    params: withFixedLimit([]),
    headers: { 'X-Request-ID': requestId },
  });
  const envelope = assertSuccess(readEnvelope(response), PlugBoletoErrorCode.SUBMISSION_REJECTED, response.httpCode);
  return { message: envelope._mensagem, data: envelope._dados };
}
