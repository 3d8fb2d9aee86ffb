import { Config } from './infrastructure/config/config.js';
import { PinoLogger } from './infrastructure/logging/pino-logger.js';
import { PlugBoletoHttpClient } from './adapters/plugboleto/plugboleto-http-client.js';
import { NodeScheduler } from './adapters/timers/node-scheduler.js';
import { Logger } from './application/ports/driven/logger-port.js';
import { PlugBoletoPort } from './application/ports/driven/plugboleto-port.js';
import { Scheduler } from './application/ports/driven/scheduler-port.js';
import {
  QueryTitlesUseCase,
  IssueTitlesUseCase,
  ProcessReturnFileUseCase,
  PrintTitlesUseCase,
  DiscardTitlesUseCase,
  WriteOffTitlesUseCase,
  GenerateRemittanceUseCase,
} from './application/use-cases/index.js';
import { BoletoService } from './application/services/boleto-service.js';
import { PlugBoletoRegistryService } from './application/services/plugboleto-registry.service.js';

export interface BoletoServiceOverrides {
  logger?: Logger;
  plugboleto?: PlugBoletoPort;
  scheduler?: Scheduler;
}

/**
 * Monta o BoletoService com os adapters padrão (axios, pino, timers do Node).
 * Qualquer porta pode ser substituída.
 */
export function createBoletoService(config: Config, overrides: BoletoServiceOverrides = {}): BoletoService {
  const logger = overrides.logger ?? new PinoLogger(config.logLevel, config.serviceName);
  const plugboleto = overrides.plugboleto ?? new PlugBoletoHttpClient(config, logger);
  const scheduler = overrides.scheduler ?? new NodeScheduler();

  const queryTitles = new QueryTitlesUseCase(plugboleto, logger);

  return new BoletoService(
    new IssueTitlesUseCase(plugboleto, scheduler, logger),
    new ProcessReturnFileUseCase(plugboleto, queryTitles, scheduler, logger),
    new PrintTitlesUseCase(plugboleto, scheduler, logger),
    queryTitles,
    new DiscardTitlesUseCase(plugboleto, logger),
    new WriteOffTitlesUseCase(plugboleto, logger),
    new GenerateRemittanceUseCase(plugboleto, logger),
    new PlugBoletoRegistryService(plugboleto, logger)
  );
}
