import { PlugBoletoErrorCode } from '../enums/plugboleto-error-code.js';

/**
 * Erro da integração com a PlugBoleto.
 *
 * A mensagem segue o formato "{mensagem do serviço}\n{motivos por item}".
 */
export class PlugBoletoError extends Error {
  constructor(
    message: string,
    public readonly code: PlugBoletoErrorCode,
    public readonly reasons: string[] = [],
    public readonly statusCode?: number
  ) {
    super(composeErrorMessage(message, reasons));
    this.name = 'PlugBoletoError';
  }
}

export function composeErrorMessage(message: string, reasons: string[]): string {
  return `${message}\n${reasons.join('\n')}`;
}
