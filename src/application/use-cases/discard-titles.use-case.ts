import crypto from 'crypto';
import { PlugBoletoPort } from '../ports/driven/plugboleto-port.js';
import { Logger } from '../ports/driven/logger-port.js';
import { CommandResult } from '../dtos/remittance-result.dto.js';
import { requireIds, sendBatchCommand } from '../helpers/batch-command.js';

/**
 * Use Case: Descartar boletos ainda não registrados no banco
 */
export class DiscardTitlesUseCase {
  constructor(
    private plugboleto: PlugBoletoPort,
    private logger: Logger
  ) {}

  async execute(ids: string[], requestId: string = crypto.randomUUID()): Promise<CommandResult> {
    requireIds(ids, 'o descarte');
    const result = await sendBatchCommand(this.plugboleto, 'boletos/descarta/lote', ids, requestId);
    this.logger.info({ requestId, count: ids.length }, 'Descarte de boletos solicitado');
    return result;
  }
}
