/**
 * Port: Logger estruturado
 *
 * O contexto é sanitizado pelo adapter antes de qualquer registro
 * (credenciais removidas, CNPJ mascarado).
 */
export interface LogContext {
  requestId?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(context: LogContext, message: string): void;
  error(context: LogContext, message: string): void;
  warn(context: LogContext, message: string): void;
  debug(context: LogContext, message: string): void;
}
