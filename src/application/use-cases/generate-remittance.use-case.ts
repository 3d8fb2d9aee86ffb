import crypto from 'crypto';
import { PlugBoletoPort } from '../ports/driven/plugboleto-port.js';
import { Logger } from '../ports/driven/logger-port.js';
import { RemittanceResult } from '../dtos/remittance-result.dto.js';
import { isErrorEnvelope, remittanceDataSchema } from '../schemas/plugboleto-envelope.schema.js';
import { readEnvelope, stringifyReason } from '../helpers/envelope-helpers.js';
import { requireIds } from '../helpers/batch-command.js';

/**
 * Use Case: Gerar arquivo remessa para os boletos informados
 */
export class GenerateRemittanceUseCase {
  constructor(
    private plugboleto: PlugBoletoPort,
    private logger: Logger
  ) {}

  async execute(ids: string[], requestId: string = crypto.randomUUID()): Promise<RemittanceResult> {
    requireIds(ids, 'gerar o arquivo remessa');

    const response = await this.plugboleto.post('remessas/lote', ids, {
      headers: { 'X-Request-ID': requestId },
    });
    const envelope = readEnvelope(response);
    const parsed = remittanceDataSchema.safeParse(envelope._dados);

    const result: RemittanceResult = { status: !isErrorEnvelope(envelope), success: null, errors: [] };
    if (!parsed.success) {
      result.status = false;
      return result;
    }

    const [generated] = parsed.data._sucesso ?? [];
    if (generated) {
      result.success = { ...generated, titulos: generated.titulos.map((item) => item.idintegracao) };
    } else {
      result.status = false;
    }

    result.errors = (parsed.data._falha ?? []).map((item) => ({
      idintegracao: item.idintegracao,
      error: stringifyReason(item._erro),
    }));

    this.logger.info(
      { requestId, generated: result.success !== null, failed: result.errors.length },
      'Arquivo remessa solicitado'
    );

    return result;
  }
}
