/**
 * Exportações centralizadas dos ports driven (integrações externas)
 */
export type { Logger, LogContext } from './logger-port.js';
export type {
  PlugBoletoPort,
  QueryParam,
  RequestOptions,
  TransportDiagnostics,
  TransportResponse,
  UploadFile,
} from './plugboleto-port.js';
export type { Scheduler } from './scheduler-port.js';
