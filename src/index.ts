export { createBoletoService } from './container.js';
export type { BoletoServiceOverrides } from './container.js';
export { BoletoService } from './application/services/boleto-service.js';
export { PlugBoletoRegistryService } from './application/services/plugboleto-registry.service.js';
export type { RegistryPayload } from './application/services/plugboleto-registry.service.js';
export { pollUntilReady } from './application/services/poll-until-ready.js';
export type { PollOptions, PollResult } from './application/services/poll-until-ready.js';
export { correlate, idFilterParams } from './application/services/batch-correlator.js';
export type { Correlation } from './application/services/batch-correlator.js';

export { loadConfig, resolveBaseUrl, PLUGBOLETO_PRODUCTION_URL, PLUGBOLETO_SANDBOX_URL } from './infrastructure/config/config.js';
export type { Config } from './infrastructure/config/config.js';
export { PinoLogger } from './infrastructure/logging/pino-logger.js';
export { PlugBoletoHttpClient } from './adapters/plugboleto/plugboleto-http-client.js';
export { NodeScheduler } from './adapters/timers/node-scheduler.js';

export { translate, supportedBanks, loadBankRules, BANK_RULES } from './domain/rules/bank-rule-table.js';
export type { ReturnLayout, BankRules, BankProfile } from './domain/rules/bank-rule-table.js';
export { PlugBoletoError } from './domain/errors/plugboleto-error.js';
export { PlugBoletoErrorCode } from './domain/enums/plugboleto-error-code.js';
export { parseMoney, formatCents, fromCents } from './domain/value-objects/money.js';
export type { MoneyCents } from './domain/value-objects/money.js';

export type { Title, TitleStatus, Occurrence, SubOccurrence, TitlePayment } from './domain/entities/title.js';
export type { NormalizedAction, ProcessedAction, ActionKind } from './domain/entities/normalized-action.js';
export type { TitleIssueRequest, IssuedTitle, IssueFailure, IssuanceResult } from './application/dtos/issuance-result.dto.js';
export type { ReturnProcessingResult, UnreconciledTitle } from './application/dtos/return-processing-result.dto.js';
export type { PrintMode, PrintLayout, PrintTarget } from './application/dtos/print-request.dto.js';
export type { CommandResult, RemittanceResult, RemittanceFailure } from './application/dtos/remittance-result.dto.js';
export type {
  Logger,
  LogContext,
  PlugBoletoPort,
  QueryParam,
  RequestOptions,
  TransportDiagnostics,
  TransportResponse,
  UploadFile,
  Scheduler,
} from './application/ports/driven/index.js';
