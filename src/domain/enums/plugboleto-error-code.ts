/**
 * Códigos de erro da integração com a PlugBoleto
 */
export enum PlugBoletoErrorCode {
  /** O serviço respondeu com _status "erro" ao receber o lote */
  SUBMISSION_REJECTED = 'SUBMISSION_REJECTED',

  /** Falha de rede ou HTTP fora do envelope esperado */
  TRANSPORT_FAILURE = 'TRANSPORT_FAILURE',

  /** Protocolo em situação diferente de PROCESSANDO/PROCESSADO */
  PROCESSING_FAILED = 'PROCESSING_FAILED',

  /** PDF não ficou pronto dentro das tentativas */
  PRINT_NOT_READY = 'PRINT_NOT_READY',

  /** Entrada inválida, rejeitada antes de qualquer requisição */
  VALIDATION_FAILED = 'VALIDATION_FAILED',
}
