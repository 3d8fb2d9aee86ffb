export type AsyncOperationStatus = 'processing' | 'processed' | 'error';

/**
 * Operação em lote aguardando processamento no servidor.
 * Vive apenas durante uma chamada.
 */
export interface AsyncOperation {
  protocol: string;
  status: AsyncOperationStatus;
  pollIntervalMs: number;
  maxAttempts: number;
  attemptsConsumed: number;
}

const SITUATION_STATUS: Record<string, AsyncOperationStatus> = {
  PROCESSANDO: 'processing',
  PROCESSADO: 'processed',
};

export function operationStatusFromSituation(situation: string): AsyncOperationStatus {
  return SITUATION_STATUS[situation.trim().toUpperCase()] ?? 'error';
}
