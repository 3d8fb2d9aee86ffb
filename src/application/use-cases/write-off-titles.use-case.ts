import crypto from 'crypto';
import { PlugBoletoPort } from '../ports/driven/plugboleto-port.js';
import { Logger } from '../ports/driven/logger-port.js';
import { CommandResult } from '../dtos/remittance-result.dto.js';
import { requireIds, sendBatchCommand } from '../helpers/batch-command.js';

/**
 * Use Case: Baixar boletos no banco e na PlugBoleto
 */
export class WriteOffTitlesUseCase {
  constructor(
    private plugboleto: PlugBoletoPort,
    private logger: Logger
  ) {}

  async execute(ids: string[], requestId: string = crypto.randomUUID()): Promise<CommandResult> {
    requireIds(ids, 'a baixa');
    const result = await sendBatchCommand(this.plugboleto, 'boletos/baixa/lote', ids, requestId);
    this.logger.info({ requestId, count: ids.length }, 'Baixa de boletos solicitada');
    return result;
  }
}
